import type { RPCConfig } from '@codescout/httpkit';
import * as z from 'zod';

import { ServiceRegistry } from '../services/registry.js';
import { errorResult, parseRequest } from '../utils/request.utils.js';

const bodySchema = z.object({
  title: z.string().trim().min(1).optional(),
  content: z.string().optional(),
}).strict().refine((value) => value.title !== undefined || value.content !== undefined, {
  message: 'No data provided',
});

const handler: RPCConfig = {
  type: 'api',
  method: 'PUT',
  path: '/api/note/:id',
  name: 'Update note',
  handler: async (req) => {
    try {
      const changes = parseRequest(bodySchema, req.body);
      const note = await ServiceRegistry.get().notes.update(req.params.id ?? '', changes);
      return { body: { status: 'success', note } };
    }
    catch (error) {
      return errorResult(error);
    }
  },
};

export default handler;
