import { DicomTarget } from './types.js';

export class LoadTestError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'LoadTestError';
    this.code = code;
  }
}

export class ConfigError extends LoadTestError {
  key?: string;

  constructor(message: string, key?: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.key = key;
  }
}

export class CatalogError extends LoadTestError {
  root?: string;

  constructor(message: string, root?: string) {
    super(message, 'CATALOG_ERROR');
    this.name = 'CatalogError';
    this.root = root;
  }
}

export class InsufficientDataError extends LoadTestError {
  requested: number;
  available: number;

  constructor(requested: number, available: number, message?: string) {
    super(message ?? `Requested ${requested} payloads but only ${available} available`, 'INSUFFICIENT_DATA');
    this.name = 'InsufficientDataError';
    this.requested = requested;
    this.available = available;
  }
}

export class ConnectivityError extends LoadTestError {
  target: DicomTarget;

  constructor(target: DicomTarget) {
    super(
      `C-ECHO to ${target.calledAeTitle}@${target.host}:${target.port} failed`,
      'CONNECTIVITY_ERROR',
    );
    this.name = 'ConnectivityError';
    this.target = target;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
