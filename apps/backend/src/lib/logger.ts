import type { Logger as DrizzleLoggerInterface } from "drizzle-orm"
import type { LoggingLevel } from "@/constants/env.constants"
import { AccessError } from "@/errors/access.errors"
import { HTTPError } from "@/errors/http.errors"

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export interface LogContext {
  userId?: string
  packageId?: string
  subscriptionId?: string
  eventId?: string
  [key: string]: string | number | boolean | null | undefined
}

// Set once at startup; until then LOGGING from the environment applies
let configuredLogging: LoggingLevel | undefined

export function configureLogging(level: LoggingLevel | undefined): void {
  configuredLogging = level
}

function loggingLevel(): string | undefined {
  return configuredLogging ?? process.env.LOGGING
}

class Logger {
  private context: LogContext = {}

  with(context: LogContext): Logger {
    const logger = new Logger()
    logger.context = { ...this.context, ...context }
    return logger
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    // Silence all logs in test environment
    if (process.env.NODE_ENV === "test") {
      return
    }

    if (level === LogLevel.DEBUG && loggingLevel() === "minimal") {
      return
    }

    const timestamp = new Date().toISOString()
    const logEntry = {
      timestamp,
      level,
      message,
      ...this.context,
      ...(data !== undefined && { data }),
    }

    switch (level) {
      case LogLevel.ERROR:
        console.error(JSON.stringify(logEntry))
        break
      case LogLevel.WARN:
        console.warn(JSON.stringify(logEntry))
        break
      default:
        console.log(JSON.stringify(logEntry))
    }
  }

  debug(message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, message, data)
  }

  info(message: string, data?: unknown) {
    this.log(LogLevel.INFO, message, data)
  }

  warn(message: string, data?: unknown) {
    this.log(LogLevel.WARN, message, data)
  }

  error(message: string, error?: unknown) {
    if (error instanceof HTTPError) {
      this.log(LogLevel.ERROR, message, {
        error: error.message,
        errorCode: error.code,
        details: error.details,
        stack: error.stack,
      })
      return
    }

    if (error instanceof AccessError) {
      this.log(LogLevel.ERROR, message, {
        error: error.message,
        errorCode: error.code,
        cause:
          error.cause instanceof Error ? error.cause.message : error.cause,
        stack: error.stack,
      })
      return
    }

    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, {
        error: error.message,
        stack: error.stack,
      })
      return
    }

    this.log(LogLevel.ERROR, message, { error: String(error) })
  }

  // Convenience method for operation tracking
  operation(operation: string) {
    return {
      start: (details?: unknown) => {
        this.info(`${operation} started`, details)
      },
      success: (details?: unknown) => {
        this.info(`${operation} completed`, details)
      },
      failure: (error: unknown) => {
        this.error(`${operation} failed`, error)
      },
    }
  }
}

export type { Logger }

export const logger = new Logger()

/**
 * Creates a logger with module tracking
 * @param module - Module name (e.g., 'access.service', 'subscription.repository')
 */
export function createLogger(module: string): Logger {
  return logger.with({ module })
}

/**
 * Drizzle ORM logger implementation
 * Integrates Drizzle query logging with our existing logger infrastructure
 */
export class DrizzleLogger implements DrizzleLoggerInterface {
  private logger: Logger

  constructor(module = "drizzle") {
    this.logger = createLogger(module)
  }

  logQuery(query: string, params: unknown[]): void {
    this.logger.debug("SQL Query", {
      sql: query,
      params: params.length > 0 ? params : undefined,
    })
  }
}
