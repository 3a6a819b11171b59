export interface AppConfig {
  domain: string;
  canonicalHost: string;
  equivalentHosts: string[];
  fromDate: string;
  toDate: string;
  modernCutoffDate: string;
  outputRoot: string;
  maxSelections: number;
  requestIntervalMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  discoveryPageSize: number;
  discoveryMaxPageRetries: number;
  cdxEndpoint: string;
  replayBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  preserveQuery: boolean;
  onlyMissingFrom?: string;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface OutputPaths {
  siteDir: string;
  stateDir: string;
  reportsDir: string;
}
