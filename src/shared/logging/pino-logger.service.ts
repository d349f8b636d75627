import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { DestinationStream, Level, Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

export type LogFields = Record<string, unknown>;

/**
 * Root logger for the client. Every line carries the device id so the
 * records of concurrent CLI runs can be told apart. Lines go to stderr:
 * stdout is reserved for the JSON event lines.
 */
export function createRootLogger(
  configService: ConfigService<AppConfig>,
  destination?: DestinationStream,
): Logger {
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const pretty = nodeEnv === 'development' && destination === undefined;

  return pino(
    {
      level: configService.get('logLevel', { infer: true }) || 'info',
      ...(pretty && {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname', destination: 2 },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        client: 'scan-job-client',
        deviceId: configService.get('scanApi', { infer: true })?.deviceId,
      },
    },
    pretty ? undefined : (destination ?? pino.destination(2)),
  );
}

@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(configService: ConfigService<AppConfig>) {
    this.logger = createRootLogger(configService);
  }

  setContext(context: string): void {
    this.context = context;
  }

  // Nest's own calls: (message, context?)
  log(message: string, context?: string): void {
    this.write('info', {}, message, context);
  }

  error(message: string, trace?: string, context?: string): void {
    this.write('error', trace === undefined ? {} : { trace }, message, context);
  }

  verbose(message: string, context?: string): void {
    this.write('trace', {}, message, context);
  }

  // Structured calls: (fields, message)
  info(fields: LogFields, message: string): void {
    this.write('info', fields, message);
  }

  warn(fields: LogFields | string, message?: string): void {
    if (typeof fields === 'string') {
      this.write('warn', {}, fields, message);
    } else {
      this.write('warn', fields, message ?? '');
    }
  }

  debug(fields: LogFields | string, message?: string): void {
    if (typeof fields === 'string') {
      this.write('debug', {}, fields, message);
    } else {
      this.write('debug', fields, message ?? '');
    }
  }

  child(bindings: LogFields): PinoLoggerService {
    const child: PinoLoggerService = Object.create(this);
    child.logger = this.logger.child(bindings);
    return child;
  }

  withJobId(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  withDeviceId(deviceId: string): PinoLoggerService {
    return this.child({ deviceId });
  }

  private write(level: Level, fields: LogFields, message: string, context?: string): void {
    this.logger[level]({ context: context ?? this.context, ...fields }, message);
  }
}
