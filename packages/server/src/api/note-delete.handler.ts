import type { RPCConfig } from '@codescout/httpkit';

import { ServiceRegistry } from '../services/registry.js';
import { errorResult } from '../utils/request.utils.js';

const handler: RPCConfig = {
  type: 'api',
  method: 'DELETE',
  path: '/api/note/:id',
  name: 'Delete note',
  handler: async (req) => {
    try {
      await ServiceRegistry.get().notes.delete(req.params.id ?? '');
      return { body: { status: 'success', message: 'Note deleted' } };
    }
    catch (error) {
      return errorResult(error);
    }
  },
};

export default handler;
