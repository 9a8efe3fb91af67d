export {
  DEFAULTS,
  LogLevel,
  RetentionPolicySchema,
  ServerConfigSchema,
  type ServerConfig,
  type LoggingConfig,
  type RetentionPolicy,
} from "./server-config.js";
