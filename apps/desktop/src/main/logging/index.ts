export {
  LogFileWriter,
  getLogFileWriter,
  initializeLogFileWriter,
  shutdownLogFileWriter,
  type FileLogLevel,
  type LogFileWriterOptions,
} from './log-file-writer.js';
export { createLauncherLogger, type LauncherLoggerOptions, type LogSink } from './launcher-logger.js';
