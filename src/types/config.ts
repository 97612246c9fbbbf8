export type EngineName = 'http' | 'yt-dlp';

export interface AppConfig {
  downloadDirectory: string;
  dataDirectory: string;
  /** 0 = unlimited */
  maxBytesPerSecond: number;
  resolveTimeoutMs: number;
  progressIntervalMs: number;
  progressIntervalBytes: number;
  engine: EngineName;
  ytDlpPath: string;
  ytDlpCookies?: string;
  defaultQuality: string;
  defaultFormat: string;
  logLevel: string;
  sentryDsn?: string;
}
