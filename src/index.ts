export * from "./model/constants.js";
export * from "./model/divisions.js";
export * from "./model/validationError.js";
export * from "./model/costFactors.js";
export * from "./model/repositoryMetrics.js";
export * from "./model/divisionMetadata.js";
export * from "./model/repositoryConfig.js";
export * from "./cost/sinphaseCost.js";
export * from "./cost/costResult.js";
export * from "./cost/organizationReport.js";
export * from "./cost/calculator.js";
export * from "./config/sinphaseYaml.js";
export * from "./config/hash.js";
export * from "./config/templates.js";
export * from "./github/metrics.js";
export * from "./report/interchange.js";
export * from "./formatters/costSummary.js";
export { runAnalyze, DEFAULT_REPORT_PATH, type AnalyzeOptions } from "./cli/analyze.js";
export { runDisplay, DISPLAY_FORMATS, isDisplayFormat, type DisplayFormat, type DisplayOptions } from "./cli/display.js";
export { runInit, type InitOptions } from "./cli/init.js";
