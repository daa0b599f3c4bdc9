import type { KVBase, Logger } from '@codescout/httpkit';
import { NotFoundError, RequestValidationError } from '@codescout/research';
import type { CompletionGateway } from '@codescout/research';
import { v4 as uuidv4 } from 'uuid';
import * as z from 'zod';

export const noteSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type Note = z.infer<typeof noteSchema>;

export interface NoteRepository {
  get(id: string): Promise<Note | undefined>;
  list(): Promise<Note[]>;
  put(note: Note): Promise<void>;
  /** Resolves false when there was nothing to delete. */
  delete(id: string): Promise<boolean>;
}

const NOTE_PREFIX = 'note:';

/** Notes kept in the shared KV store, one key per note. */
export class KvNoteRepository implements NoteRepository {
  constructor(private readonly kv: KVBase) {}

  async get(id: string): Promise<Note | undefined> {
    const parsed = noteSchema.safeParse(await this.kv.get<unknown>(`${NOTE_PREFIX}${id}`));
    return parsed.success ? parsed.data : undefined;
  }

  async list(): Promise<Note[]> {
    const keys = await this.kv.keys(NOTE_PREFIX);
    const notes = await Promise.all(keys.map((key) => this.get(key.slice(NOTE_PREFIX.length))));
    return notes.filter((note): note is Note => note !== undefined);
  }

  async put(note: Note): Promise<void> {
    await this.kv.set(`${NOTE_PREFIX}${note.id}`, note);
  }

  async delete(id: string): Promise<boolean> {
    const key = `${NOTE_PREFIX}${id}`;

    if (!(await this.kv.has(key))) {
      return false;
    }

    await this.kv.del(key);
    return true;
  }
}

const NOTE_NAME_PROMPT = `You are an expert note name generator.
You will be given a note content and you need to generate a short name for it.
Reply with the name only.`;

const MAX_TITLE_LENGTH = 120;

export class NoteService {
  constructor(
    private readonly repository: NoteRepository,
    private readonly completion: CompletionGateway,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(content: string): Promise<Note> {
    if (!content.trim()) {
      throw new RequestValidationError('Content is required');
    }

    const title = await this.generateTitle(content);
    const timestamp = this.now().toISOString();
    const note: Note = { id: uuidv4(), title, content, createdAt: timestamp, updatedAt: timestamp };
    await this.repository.put(note);
    this.logger?.info('note.created', { id: note.id, title });
    return note;
  }

  list(): Promise<Note[]> {
    return this.repository.list();
  }

  async get(id: string): Promise<Note> {
    const note = await this.repository.get(id);

    if (!note) {
      throw new NotFoundError('Note not found');
    }

    return note;
  }

  async update(id: string, changes: { title?: string; content?: string }): Promise<Note> {
    const existing = await this.get(id);
    const updated: Note = {
      ...existing,
      ...(changes.title !== undefined ? { title: changes.title } : {}),
      ...(changes.content !== undefined ? { content: changes.content } : {}),
      updatedAt: this.now().toISOString(),
    };
    await this.repository.put(updated);
    this.logger?.info('note.updated', { id });
    return updated;
  }

  async delete(id: string): Promise<void> {
    if (!(await this.repository.delete(id))) {
      throw new NotFoundError('Note not found');
    }

    this.logger?.info('note.deleted', { id });
  }

  private async generateTitle(content: string): Promise<string> {
    const raw = await this.completion.complete({
      messages: [
        { role: 'system', content: NOTE_NAME_PROMPT },
        { role: 'user', content: `Given:\n- The note content: ${content}` },
      ],
      temperature: 0.3,
    });
    const title = raw.trim().replace(/^["'`]+|["'`]+$/g, '').trim();
    return title ? title.slice(0, MAX_TITLE_LENGTH) : 'Untitled Note';
  }
}
