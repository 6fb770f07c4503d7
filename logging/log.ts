import { ValueError } from '@sinclair/typebox/value';

const LoggingLevels = {
  debug: -1,
  info: 0,
  warn: 1,
  error: 2,
} as const;
export type LoggingLevel = keyof typeof LoggingLevels;

export type LogFn = (
  msg: string,
  ctx?: MessageMetadata,
  level?: LoggingLevel,
) => void;
export type Logger = {
  [key in LoggingLevel]: (msg: string, metadata?: MessageMetadata) => void;
};

export type Tags =
  | 'invariant-violation'
  | 'state-transition'
  | 'invalid-control-message'
  | 'flow-error';

export type MessageMetadata = Partial<{
  sessionId: string;
  connId: string;
  flowId: string;
  peer: string;
  localAddress: string;
  controlMessage: Record<string, unknown>;
  validationErrors: Array<ValueError>;
  tags: Array<Tags>;
  telemetry: {
    traceId: string;
    spanId: string;
  };
}>;

// msgpack-decoded control messages carry bigints which JSON.stringify rejects
const cleanedLogFn = (log: (msg: string, metadata?: MessageMetadata) => void) => {
  return (msg: string, metadata?: MessageMetadata) => {
    if (!metadata?.controlMessage) {
      log(msg, metadata);
      return;
    }

    const controlMessage: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata.controlMessage)) {
      controlMessage[key] = typeof value === 'bigint' ? value.toString() : value;
    }

    log(msg, { ...metadata, controlMessage });
  };
};

export class BaseLogger implements Logger {
  minLevel: LoggingLevel;
  private output: LogFn;

  constructor(output: LogFn, minLevel: LoggingLevel = 'info') {
    this.minLevel = minLevel;
    this.output = output;
  }

  debug(msg: string, metadata?: MessageMetadata) {
    if (LoggingLevels[this.minLevel] <= LoggingLevels.debug) {
      this.output(msg, metadata ?? {}, 'debug');
    }
  }

  info(msg: string, metadata?: MessageMetadata) {
    if (LoggingLevels[this.minLevel] <= LoggingLevels.info) {
      this.output(msg, metadata ?? {}, 'info');
    }
  }

  warn(msg: string, metadata?: MessageMetadata) {
    if (LoggingLevels[this.minLevel] <= LoggingLevels.warn) {
      this.output(msg, metadata ?? {}, 'warn');
    }
  }

  error(msg: string, metadata?: MessageMetadata) {
    if (LoggingLevels[this.minLevel] <= LoggingLevels.error) {
      this.output(msg, metadata ?? {}, 'error');
    }
  }
}

export const stringLogger: LogFn = (msg, ctx, level = 'info') => {
  const from = ctx?.sessionId ? `session ${ctx.sessionId} -- ` : '';
  console.log(`[latency:${level}] ${from}${msg}`);
};

const colorMap = {
  debug: '\u001b[34m',
  info: '\u001b[32m',
  warn: '\u001b[33m',
  error: '\u001b[31m',
};

export const coloredStringLogger: LogFn = (msg, ctx, level = 'info') => {
  const color = colorMap[level];
  const from = ctx?.sessionId ? `session ${ctx.sessionId} -- ` : '';
  console.log(`[latency:${color}${level}\u001b[0m] ${from}${msg}`);
};

export const jsonLogger: LogFn = (msg, ctx, level) => {
  console.log(JSON.stringify({ msg, ctx, level }));
};

export const createLogProxy = (log: Logger): Logger => ({
  debug: cleanedLogFn(log.debug.bind(log)),
  info: cleanedLogFn(log.info.bind(log)),
  warn: cleanedLogFn(log.warn.bind(log)),
  error: cleanedLogFn(log.error.bind(log)),
});

/**
 * Builds the logger a component should use from either a bare output
 * function or an existing {@link Logger}.
 */
export function createLogger(fn: LogFn | Logger, level?: LoggingLevel) {
  if (typeof fn === 'function') {
    return createLogProxy(new BaseLogger(fn, level));
  }

  return createLogProxy(fn);
}
