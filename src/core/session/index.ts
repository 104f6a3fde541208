export {
  SessionMonitor,
  SessionStateSchema,
  DEFAULT_SESSION_CONFIG,
  SESSION_DATA_FIELD,
  LOGIN_COUNT_FIELD,
  LAST_ACTIVITY_FIELD,
  generateSessionToken,
} from "./sessionMonitor";
export type {
  SessionState,
  SessionPlatform,
  SessionValidation,
  SessionInfo,
  InvalidReason,
  SessionMonitorConfig,
  SessionMonitorDeps,
} from "./sessionMonitor";
