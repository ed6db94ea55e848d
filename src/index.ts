export * from './types.js';
export { classify, sniffMimeType, normalizeExtension, DEFAULT_MEDIA_EXTENSIONS, DEFAULT_ARCHIVE_EXTENSIONS } from './classifier.js';
export { ArchiveExpander, DEFAULT_MAX_ARCHIVE_PASSES } from './archive-expander.js';
export { PathPlanner, plan, disambiguate, listScopes, resolveScope } from './path-planner.js';
export { Relocator, MEDIA_LEFT_IN_PLACE } from './relocator.js';
export { RunCoordinator, NOT_A_REGULAR_FILE, type RunCoordinatorOptions, type RunOutcome } from './run-coordinator.js';
export { OperationLog, buildSummary, createOperationRecord } from './operation-log.js';
export { walkFiles } from './scanner.js';
export { removeEmptyDirectories } from './directory-cleanup.js';
export { nodeFileSystem, type FileSystem } from './filesystem.js';
export { ConfigManager, DEFAULT_CONFIG, type AppConfig } from './config.js';
export { RunLogWriter } from './run-log-writer.js';
export { Logger, logger, AppError } from './logger.js';
