export * from './devices/index.js';

export { HomgarClient, type HomgarClientOptions } from './clients/homgar.client.js';
export { FileSessionStore, MemorySessionStore, type SessionStore } from './clients/session.store.js';

export {
  AppError,
  DeviceStatusDecodeError,
  ErrorCode,
  HomgarApiError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from './utils/errors.js';

export { fromPino } from './utils/logger.js';

export type { Home, HomgarLogger, HomgarSession, LogLevel, StatusRecord } from './types/index.js';
