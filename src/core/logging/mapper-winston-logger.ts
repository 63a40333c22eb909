// SPDX-License-Identifier: Apache-2.0

import winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type MapperLogger} from './mapper-logger.js';

const customFormat = winston.format.combine(
  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

@injectable()
export class MapperWinstonLogger implements MapperLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private developmentMode: boolean;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, debug output includes the full error chain
   * @param logFile - file to write to; null logs to the console
   * @param silent - suppress all transports
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogFile) logFile?: string | null,
    @inject(InjectTokens.LogSilent) silent?: boolean,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    silent = patchInject(silent, InjectTokens.LogSilent, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      silent,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [logFile ? new winston.transports.File({filename: logFile}) : new winston.transports.Console()],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_.map(argument => this.describeError(argument)), this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }

  private describeError(argument: unknown): unknown {
    if (!(argument instanceof Error)) {
      return argument;
    }

    return this.developmentMode ? {error: argument.message, stack: argument.stack} : {error: argument.message};
  }
}
