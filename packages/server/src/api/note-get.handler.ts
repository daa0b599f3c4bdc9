import type { RPCConfig } from '@codescout/httpkit';

import { ServiceRegistry } from '../services/registry.js';
import { errorResult } from '../utils/request.utils.js';

const handler: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/api/note/:id',
  name: 'Get note',
  handler: async (req) => {
    try {
      const note = await ServiceRegistry.get().notes.get(req.params.id ?? '');
      return { body: { status: 'success', note } };
    }
    catch (error) {
      return errorResult(error);
    }
  },
};

export default handler;
