// src/config/env.ts
// What: Configuration of the running process.
// How: Loads .env via dotenv, then validates process.env with parseConfig(); throws on import when invalid
//      so the server never starts half-configured.

import 'dotenv/config';
import { AppConfig, parseConfig } from './schema.js';

export type { AppConfig } from './schema.js';

const config: AppConfig = parseConfig(process.env);

export default config;
