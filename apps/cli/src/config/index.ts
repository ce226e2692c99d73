export { env, parseEnv, envSchema, type CliEnv } from './env.js';
export { buildConfig, loadBaseConfig, type ConvertFlags } from './options.js';
