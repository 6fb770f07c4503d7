export {
  BaseLogger,
  stringLogger,
  coloredStringLogger,
  jsonLogger,
  createLogProxy,
  createLogger,
} from './log';
export type {
  LogFn,
  Logger,
  LoggingLevel,
  MessageMetadata,
  Tags,
} from './log';
