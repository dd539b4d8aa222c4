export {
  loadConfig,
  withOverrides,
  withScheme,
  DEFAULT_PORT,
  DEFAULT_AUTH_SERVICE_URL,
  DEFAULT_INSTRUCTION_TIMEOUT_MS,
  DEFAULT_AUTH_TIMEOUT_MS,
} from './config.js';
export type { AppConfig, InstructionBackendConfig } from './config.js';
