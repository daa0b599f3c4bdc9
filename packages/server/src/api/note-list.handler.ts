import type { RPCConfig } from '@codescout/httpkit';

import { ServiceRegistry } from '../services/registry.js';
import { errorResult } from '../utils/request.utils.js';

const handler: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/api/note',
  name: 'List notes',
  handler: async () => {
    try {
      const notes = await ServiceRegistry.get().notes.list();
      return { body: { status: 'success', notes } };
    }
    catch (error) {
      return errorResult(error);
    }
  },
};

export default handler;
