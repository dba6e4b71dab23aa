import axios from 'axios';
import chalk from 'chalk';
import { basename } from 'path';
import { ApiClient, DeletionResult, DocumentRecord } from './api';
import { getConfig } from './config';

let cachedClient: ApiClient | null = null;

export function getApiClient(): ApiClient {
  if (!cachedClient) {
    cachedClient = new ApiClient(getConfig());
  }
  return cachedClient;
}

export function formatDeletionStatus(status: DeletionResult['status']): string {
  return status === 'SUCCESS' ? chalk.green(status) : chalk.red(status);
}

export function formatSize(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)}KB`;
}

/**
 * Local file name for an exported document, with directory components
 * stripped from both server-supplied parts.
 */
export function exportFileName(record: Pick<DocumentRecord, 'docCatCode' | 'docName'>): string {
  return `${basename(record.docCatCode)}-${basename(record.docName)}`;
}

function readApiErrorMessage(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return undefined;
  }
  const error = data.error;
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response?.status === 404) {
      return 'Document not found';
    }
    return readApiErrorMessage(error.response?.data) ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function handleError(error: unknown, operation: string): never {
  console.error(chalk.red(`${operation} failed:`), describeError(error));
  process.exit(1);
}
