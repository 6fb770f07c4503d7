import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { LogFn, LoggingLevel, coloredStringLogger, jsonLogger, stringLogger } from './logging';
import { initiatorFlows, noFlows } from './transport/flows';
import { ProbeProtocol } from './transport/message';
import { ProvidedControlServerOptions } from './transport/options';

const Millis = Type.Integer({ minimum: 1 });

export const EnvSchema = Type.Object({
  LATENCY_CONTROL_ADDRESS: Type.String({ default: '0.0.0.0:9000' }),
  /** Comma separated ports the clients run reflectors on. */
  LATENCY_PROBE_PORTS: Type.String({
    default: '',
    pattern: '^(\\d+(,\\d+)*)?$',
  }),
  LATENCY_PROTOCOL: Type.Union([Type.Literal('udp'), Type.Literal('tcp')], {
    default: 'udp',
  }),
  LATENCY_HANDSHAKE_TIMEOUT_MS: Type.Optional(Millis),
  LATENCY_HANDSHAKE_RETRY_MS: Type.Optional(Millis),
  LATENCY_IDLE_TIMEOUT_MS: Type.Optional(Millis),
  LATENCY_IDLE_RESET_ON_ACTIVITY: Type.Optional(Type.Boolean()),
  LATENCY_PROBE_INTERVAL_MS: Type.Optional(Millis),
  LATENCY_PACKET_SIZE: Type.Optional(Type.Integer()),
  LATENCY_SHUTDOWN_GRACE_MS: Type.Integer({ minimum: 0, default: 0 }),
  LATENCY_LOG_LEVEL: Type.Union(
    [
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
    ],
    { default: 'info' },
  ),
  LATENCY_LOG_FORMAT: Type.Union(
    [Type.Literal('string'), Type.Literal('color'), Type.Literal('json')],
    { default: 'string' },
  ),
});

export type Env = Static<typeof EnvSchema>;

export interface HarnessConfig {
  controlAddress: string;
  serverOptions: ProvidedControlServerOptions;
  logLevel: LoggingLevel;
  logFn: LogFn;
}

const logFns: Record<Env['LATENCY_LOG_FORMAT'], LogFn> = {
  string: stringLogger,
  color: coloredStringLogger,
  json: jsonLogger,
};

/**
 * Reads the `LATENCY_*` variables out of `env`, applying defaults.
 * @throws {Error} listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): HarnessConfig {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('LATENCY_') && value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const converted = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));
  if (!Value.Check(EnvSchema, converted)) {
    const problems = [...Value.Errors(EnvSchema, converted)].map(
      (err) => `${err.path.slice(1)}: ${err.message}`,
    );
    throw new Error(`invalid configuration: ${problems.join(', ')}`);
  }

  const ports = converted.LATENCY_PROBE_PORTS
    ? converted.LATENCY_PROBE_PORTS.split(',').map(Number)
    : [];

  const serverOptions: ProvidedControlServerOptions = {
    protocol:
      converted.LATENCY_PROTOCOL === 'tcp' ? ProbeProtocol.Tcp : ProbeProtocol.Udp,
    flows: ports.length > 0 ? initiatorFlows({ ports }) : noFlows,
    shutdownGraceMs: converted.LATENCY_SHUTDOWN_GRACE_MS,
  };

  if (converted.LATENCY_HANDSHAKE_TIMEOUT_MS !== undefined) {
    serverOptions.handshakeTimeoutMs = converted.LATENCY_HANDSHAKE_TIMEOUT_MS;
  }
  if (converted.LATENCY_HANDSHAKE_RETRY_MS !== undefined) {
    serverOptions.handshakeRetryIntervalMs = converted.LATENCY_HANDSHAKE_RETRY_MS;
  }
  if (converted.LATENCY_IDLE_TIMEOUT_MS !== undefined) {
    serverOptions.idleTimeoutMs = converted.LATENCY_IDLE_TIMEOUT_MS;
  }
  if (converted.LATENCY_IDLE_RESET_ON_ACTIVITY !== undefined) {
    serverOptions.idleTimeoutResetOnActivity =
      converted.LATENCY_IDLE_RESET_ON_ACTIVITY;
  }
  if (converted.LATENCY_PROBE_INTERVAL_MS !== undefined) {
    serverOptions.probeIntervalMs = converted.LATENCY_PROBE_INTERVAL_MS;
  }
  if (converted.LATENCY_PACKET_SIZE !== undefined) {
    serverOptions.packetSizeBytes = converted.LATENCY_PACKET_SIZE;
  }

  return {
    controlAddress: converted.LATENCY_CONTROL_ADDRESS,
    serverOptions,
    logLevel: converted.LATENCY_LOG_LEVEL,
    logFn: logFns[converted.LATENCY_LOG_FORMAT],
  };
}
