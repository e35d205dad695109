import { Params } from 'nestjs-pino';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'document-outline-service';
const isProduction = process.env.NODE_ENV === 'production';

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    // Console output, pretty outside production
    {
      level: 'info',
      stream: isProduction
        ? process.stdout
        : pinoPretty({
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            singleLine: false,
          }),
    },
  ];

  // JSON file output for log shippers
  const logDir = process.env.LOG_DIR;
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    // Page text can be large; keep it out of logs
    redact: {
      paths: ['pages', 'data.pages', 'tocEntries', 'data.tocEntries'],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    stream: multistream(buildStreams()),
  },
};
