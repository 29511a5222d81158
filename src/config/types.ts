export interface AppConfig {
  authUrl: string;
  archiveBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  fetchConcurrency: number;
  firstYear: number;
  verifyLogin: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;

export interface Credentials {
  username: string;
  password: string;
}

export interface RunConfig {
  readonly credentials: Readonly<Credentials>;
  readonly outputDir: string;
  readonly verbose: boolean;
}
