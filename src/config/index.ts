export { ConfigManager, ANALYSIS_LEVELS, DEFAULT_CONFIG_FILE } from './config.js';
export type { ReasonConfig, AnalysisLevel } from './config.js';
