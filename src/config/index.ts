export {
  loadSessionConfig,
  validateSessionConfig,
  parseCliOverrides,
  isSessionCadence,
} from "./session.config";

export type {
  SessionConfig,
  SessionSettings,
  SessionCadence,
  PriceFeedConfig,
} from "./session.config";
