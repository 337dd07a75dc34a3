export interface AppConfig {
  userAgent: string;
  requestTimeoutMs: number;
  pauseBetweenRequestsMs: number;
  outputDir: string;
  ignoreHttpsErrors: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;
