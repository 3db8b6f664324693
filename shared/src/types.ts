/**
 * Shared types for seedsweep packages
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface MetricLabels {
  [key: string]: string;
}

export interface ListenAddress {
  host: string;
  port: number;
}
