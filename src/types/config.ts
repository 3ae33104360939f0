export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
}

export interface ResolutionCLIOptions {
  input: string;
  output: string;
  maxRuntime: number;
  saveEvery: number;
  rescan: boolean;
}

export interface CatalogCLIOptions extends ResolutionCLIOptions {
  threshold: number;
}

export interface MergeCLIOptions {
  primary: string;
  secondary: string;
  output: string;
  fallbackOrigin: string;
}

export interface VerifyCLIOptions {
  primary: string;
  secondary: string;
  merged: string;
}

export interface DownloadCLIOptions {
  input: string;
  maxRuntime: number;
  maxDownloads?: number;
  metadata: boolean;
  cookies: boolean;
}
