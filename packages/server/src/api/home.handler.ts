import type { RPCConfig } from '@codescout/httpkit';

const handler: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/',
  name: 'Home',
  description: 'Endpoint index',
  handler: async () => ({
    body: {
      message: 'Welcome to the API server',
      status: 'online',
      endpoints: {
        chat: 'POST /api/chat',
        search: 'POST /api/search',
        scope: 'POST /api/search/scope',
        notes: 'GET|POST /api/note, GET|PUT|DELETE /api/note/:id',
        health: 'GET /api/health',
      },
    },
  }),
};

export default handler;
