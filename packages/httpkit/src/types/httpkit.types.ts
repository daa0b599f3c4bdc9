import type { json } from 'express';
import type { HelmetOptions as HelmetLibraryOptions } from 'helmet';
import type { CorsOptions } from 'cors';

type JsonOptions = Parameters<typeof json>[0];

export type HelmetOptions = HelmetLibraryOptions;

export type HttpkitConfig = {
  port?: number;
  hostname?: string;
  servername?: string;
  loadEnv?: boolean;
  envFiles?: string[];
  rootDir?: string;
  processHandlers?: boolean;
  json?: JsonOptions;
  helmet?: HelmetOptions;
  cors?: CorsOptions | boolean;
};

export type HttpkitStartConfig = {
  handlerDir?: string | string[];
  port?: number;
};
