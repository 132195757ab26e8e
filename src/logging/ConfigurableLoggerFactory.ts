import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { setGlobalLoggerFactory, WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotating log file; `false` logs to the console only. */
  fileName?: string | false;
  maxSize?: string;
  maxFiles?: string;
  showLocation?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    if (options.fileName !== false) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName ?? './logs/agentdb-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger this factory creates
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.conversationId) {
          info.conversationId = store.conversationId;
        }
        return info;
      })(),
      format.printf((info: TransformableInfo): string => formatLine(info, this.showLocation)),
    );
  }
}

/**
 * `<timestamp> [Conv:<id>] [<label>] {pid} <level>: <message>`; the
 * conversation tag appears only inside a team run.
 */
export function formatLine(info: TransformableInfo, showLocation = false): string {
  const conversation = typeof info.conversationId === 'string' ? ` [Conv:${info.conversationId}]` : '';
  let label = typeof info.label === 'string' ? info.label : '';
  if (showLocation) {
    const className = label.split('/').pop();
    if (className && className !== 'Object') {
      label = className;
    }
  }
  const timestamp = typeof info.timestamp === 'string' ? info.timestamp : '';
  return `${timestamp}${conversation} [${label}] {W-${process.pid}} ${info.level}: ${String(info.message)}`;
}

export interface LoggingConfig {
  logLevel: string;
  logFile: string | false;
}

/**
 * Installs the winston-backed factory behind `getLoggerFor`.
 */
export function configureLogging(config: LoggingConfig): ConfigurableLoggerFactory {
  const factory = new ConfigurableLoggerFactory(config.logLevel, { fileName: config.logFile });
  setGlobalLoggerFactory(factory);
  return factory;
}
