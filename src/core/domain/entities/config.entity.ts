import { MalformedLinePolicy } from "./log-entry.entity.js";

export interface LoggingConfig {
  dir: string;
  fileName: string;
}

export interface AnalysisConfig {
  recentWindowMinutes: number;
  onMalformed: MalformedLinePolicy;
}

export interface ExportConfig {
  level: string;
  outputDir: string;
  fileName: string;
}

export interface DemoConfig {
  workDir: string;
}

export interface Config {
  logging: LoggingConfig;
  analysis: AnalysisConfig;
  export: ExportConfig;
  demo: DemoConfig;
}
