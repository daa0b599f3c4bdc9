import type { RPCConfig } from '@codescout/httpkit';
import * as z from 'zod';

import { ServiceRegistry } from '../services/registry.js';
import { errorResult, parseRequest } from '../utils/request.utils.js';

const bodySchema = z.object({
  content: z.string().trim().min(1, 'Content is required'),
});

const handler: RPCConfig = {
  type: 'api',
  method: 'POST',
  path: '/api/note',
  name: 'Create note',
  description: 'Stores a note; its title is generated by the completion model',
  handler: async (req, { logger }) => {
    try {
      const { content } = parseRequest(bodySchema, req.body);
      const note = await ServiceRegistry.get().notes.create(content);
      return { status: 201, body: { status: 'success', id: note.id, title: note.title } };
    }
    catch (error) {
      logger.warn('note creation failed', { error: `${error}` });
      return errorResult(error);
    }
  },
};

export default handler;
