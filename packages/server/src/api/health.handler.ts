import type { RPCConfig } from '@codescout/httpkit';
import * as z from 'zod';

import { ServiceRegistry } from '../services/registry.js';

const responseSchema = z.object({
  status: z.literal('healthy'),
  timestamp: z.string(),
  service: z.string(),
  devops: z.object({ organization: z.string().optional(), project: z.string().optional() }),
  completion: z.object({ default: z.string(), configured: z.array(z.string()) }),
  environment: z.object({ name: z.string(), node: z.string(), platform: z.string() }),
});

const handler: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/api/health',
  name: 'Health',
  description: 'Liveness check with a configuration summary',
  responseSchema: { 200: responseSchema },
  strict: true,
  handler: async () => {
    const { config, completions, devops } = ServiceRegistry.get();

    return {
      body: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        service: 'codescout-server',
        devops,
        completion: { default: config.completion.provider, configured: Object.keys(completions) },
        environment: { name: config.environment, node: process.version, platform: process.platform },
      },
    };
  },
};

export default handler;
