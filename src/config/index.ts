import dotenv from 'dotenv';

dotenv.config();

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
  env: string;
  logLevel: LogLevel;
}

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const level = LOG_LEVELS.find((candidate) => candidate === value?.trim().toLowerCase());
  return level ?? 'info';
};

const config: AppConfig = {
  env: process.env.NODE_ENV || 'development',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};

export default config;
