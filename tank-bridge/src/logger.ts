import { pino, stdSerializers, type Logger, type LoggerOptions } from 'pino';
import { config } from './config.js';

const prettyInDevelopment = (): LoggerOptions['transport'] =>
  process.env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard', ignore: 'name' } }
    : undefined;

// every call site passes failures under `err`
export const logger: Logger = pino({
  name: 'tank-bridge',
  level: config.logLevel,
  base: undefined,
  serializers: { err: stdSerializers.err },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: prettyInDevelopment()
});
