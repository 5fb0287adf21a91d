const mib = 1024 * 1024;

const flag = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined || value === '' ? fallback : !['0', 'false', 'no', 'off'].includes(value.toLowerCase());

export const config = {
  port: Number(process.env.PORT ?? 5000),
  host: process.env.HOST ?? '0.0.0.0',
  logLevel: process.env.LOG_LEVEL ?? 'info',
  enableCors: flag(process.env.ENABLE_CORS, true),
  ws: {
    path: process.env.WS_PATH ?? '/ws',
    maxPayloadBytes: Number(process.env.WS_MAX_PAYLOAD_BYTES ?? 16 * mib)
  }
};

export type ServerConfig = typeof config;
