import { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getLoggingConfig(): Config["logging"];
  getAnalysisConfig(): Config["analysis"];
  getExportConfig(): Config["export"];
  getDemoConfig(): Config["demo"];
}
