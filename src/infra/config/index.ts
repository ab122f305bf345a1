export {
  EnvSchema,
  parseEnv,
  createConfig,
  isValidTimeZone,
  type Env,
  type AppConfig,
} from './env.js';
