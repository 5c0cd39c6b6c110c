import fs from 'node:fs'
import { resolve } from 'node:path'
import type {
  LogDestination,
  LogLevel,
} from '@schemas/config/config.schema.js'
import type { FastifyBaseLogger } from 'fastify'
import type { DestinationStream, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export interface LoggerSettings {
  logLevel: LogLevel
  logDestination: LogDestination
  logDir: string
}

export interface LoggerSetup {
  options: LoggerOptions
  stream?: DestinationStream
}

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

type SerializableError = Error | Record<string, unknown> | string | number | boolean

/**
 * Creates a custom error serializer that handles both standard errors and TvmazeError objects.
 *
 * @returns A function that serializes error objects with message, stack, name, url, status and cause.
 */
export function createErrorSerializer() {
  return (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    // Handle primitive values (string, number, boolean)
    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('url' in err && err.url) serialized.url = err.url

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Exclude stack trace for 4xx client errors
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    const shouldIncludeStack = !status || status >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error, so it needs an explicit pass
    if ('cause' in err && err.cause) {
      serialized.cause = createErrorSerializer()(err.cause as SerializableError)
    }

    for (const key of Object.keys(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'url', 'type', 'cause'].includes(
          key,
        )
      ) {
        serialized[key] = (err as Record<string, unknown>)[key]
      }
    }

    return serialized
  }
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * If no date or timestamp is provided, returns 'tvmaze-client-current.log'.
 * Otherwise, formats the filename as 'tvmaze-client-YYYY-MM-DD[-index].log'.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'tvmaze-client-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `tvmaze-client-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logging, ensuring the log directory exists.
 *
 * If the log directory cannot be created, falls back to standard output.
 */
function getFileStream(
  logDir: string,
): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(logDir)
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      interval: '1d',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

/**
 * Builds pino options (and a destination stream where one is needed) for the
 * configured destination.
 *
 * - terminal: pino-pretty transport
 * - file: rotating file stream
 * - both: pino.multistream over the two
 *
 * A silent level skips destinations entirely so no transport worker is started.
 */
export function createLoggerConfig(settings: LoggerSettings): LoggerSetup {
  const { logLevel } = settings
  const base: LoggerOptions = {
    level: logLevel,
    serializers: {
      error: createErrorSerializer(),
    },
  }

  if (logLevel === 'silent') {
    return { options: base }
  }

  if (settings.logDestination === 'terminal') {
    return {
      options: {
        ...base,
        transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      },
    }
  }

  const fileStream = getFileStream(settings.logDir)

  if (settings.logDestination === 'file') {
    return { options: base, stream: fileStream }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return {
      options: {
        ...base,
        transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      },
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return {
    options: base,
    stream: pino.multistream([
      { stream: prettyStream, level: logLevel },
      { stream: fileStream, level: logLevel },
    ]),
  }
}

/**
 * Creates the root logger for standalone (non-Fastify) use of the client.
 */
export function createLogger(settings: LoggerSettings): Logger {
  const { options, stream } = createLoggerConfig(settings)
  return stream ? pino(options, stream) : pino(options)
}

/**
 * Creates a child logger whose messages are prefixed with the service name,
 * e.g. "[TVMAZE] Fetching shows page 1."
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  serviceName: string,
): FastifyBaseLogger {
  return baseLog.child(
    { service: serviceName.toLowerCase() },
    { msgPrefix: `[${serviceName}] ` },
  )
}
