import pino, { LoggerOptions } from 'pino';

/** Bindings carried by per-operation child loggers. */
export interface LogContext {
     hotelId?: number;
     periodId?: number;
     stocktakeId?: number;
     lineId?: number;
     actor?: string;
     transition?: 'close' | 'reopen';
}

function hotelBinding(value: string | undefined): { hotelId?: number } {
     const hotelId = Number(value);
     return value && Number.isInteger(hotelId) && hotelId > 0 ? { hotelId } : {};
}

// HOTEL_ID pins a single-site deployment's logs to its hotel.
export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
     const options: LoggerOptions = {
          level: env.LOG_LEVEL || 'info',
          formatters: {
               level: (label: string) => ({ level: label }),
          },
          serializers: {
               err: pino.stdSerializers.err,
               req: pino.stdSerializers.req,
               res: pino.stdSerializers.res,
          },
          base: {
               service: env.SERVICE_NAME || 'stockroom',
               environment: env.NODE_ENV || 'production',
               ...hotelBinding(env.HOTEL_ID),
          },
     };

     if (env.NODE_ENV === 'development') {
          options.transport = {
               target: 'pino-pretty',
               options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
               },
          };
     }

     return options;
}

export const logger = pino(buildLoggerOptions());

export function createChildLogger(context: LogContext) {
     return logger.child(context);
}
