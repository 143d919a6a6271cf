import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { UsageSummary } from '../services/conversationService';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export interface LogContext {
  sessionId?: string;
  callSid?: string;
  storeName?: string;
  intent?: string;
  toolName?: string;
  operation?: string;
  partition?: string;
  eventType?: string;
  adapterName?: string;
}

export type LogMeta = Record<string, unknown>;

class VoiceAgentLogger {
  private logger: Logger;

  constructor(level: string = 'info') {
    const isProduction = process.env.NODE_ENV === 'production';

    this.logger = createLogger({
      level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json(),
        format.printf(({ timestamp, level, message, event, sessionId, data, ...meta }) => {
          const messageStr = typeof message === 'string' ? message : String(message);
          return JSON.stringify({
            timestamp,
            level,
            event: event || messageStr.toLowerCase().replace(/\s+/g, '_'),
            sessionId,
            data: data || meta,
            message: messageStr
          });
        })
      ),
      transports: [
        new transports.Console({
          format: format.combine(format.colorize(), format.simple())
        }),
        ...(isProduction
          ? [
              new DailyRotateFile({
                filename: 'logs/voice-agent-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                maxSize: '20m',
                maxFiles: '14d',
                format: format.json()
              }),
              new DailyRotateFile({
                filename: 'logs/error-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                level: 'error',
                maxSize: '20m',
                maxFiles: '30d',
                format: format.json()
              })
            ]
          : [
              new transports.File({ filename: 'logs/voice-agent.log', format: format.json() }),
              new transports.File({ filename: 'logs/error.log', level: 'error', format: format.json() })
            ])
      ]
    });
  }

  log(level: LogLevel, message: string, context?: LogContext, meta?: LogMeta) {
    this.logger.log(level, message, { ...context, ...meta });
  }

  /**
   * Structured entry with an explicit event name
   */
  event(eventName: string, context?: LogContext, meta?: LogMeta) {
    this.logger.info(eventName, {
      event: eventName,
      data: meta,
      ...context
    });
  }

  info(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.INFO, message, context, meta);
  }

  error(message: string, error?: Error, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.ERROR, message, context, {
      error: error?.message,
      stack: error?.stack,
      ...meta
    });
  }

  warn(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.WARN, message, context, meta);
  }

  debug(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.DEBUG, message, context, meta);
  }

  logToolCall(toolName: string, params: LogMeta, context: LogContext) {
    this.event('tool_call', { ...context, toolName }, { params });
  }

  logToolResult(toolName: string, success: boolean, context: LogContext) {
    this.event('tool_result', { ...context, toolName }, { success });
  }

  logCallEnd(sessionId: string, durationSeconds: number, turnCount: number, usage?: UsageSummary) {
    this.event('call_end', { sessionId }, { durationSeconds, turnCount, usage });
  }
}

export { VoiceAgentLogger };
export const logger = new VoiceAgentLogger(process.env.LOG_LEVEL || 'info');
