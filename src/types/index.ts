/**
 * Shared type definitions
 */

/**
 * Logger accepted by the client and the decoding layer.
 * Never receives the session token or the account password.
 */
export interface HomgarLogger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// A home as listed by /app/member/appHome/list
export interface Home {
  hid: string | number;
  name: string;
}

// One entry of $.data.subDeviceStatus
export interface StatusRecord {
  id: string;
  value: string;
}

// Session persisted between runs so that a valid token is reused
export interface HomgarSession {
  email: string;
  token: string;
  tokenExpiresAt: number; // epoch ms
  refreshToken?: string;
}
