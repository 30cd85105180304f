// frontend/src/services/apiService.ts
import axios from 'axios';
import type { ApiErrorInfo } from '../types/assessment';

// Vite proxies /api to the backend in development; production serves both from one origin.
export const apiService = axios.create({
  baseURL: '/api',
  headers: {
    'Content-Type': 'application/json',
  },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Turns a rejected request into the `{ message, ...details }` body the backend sends,
 * or a generic message when the server could not be reached.
 */
export const toApiError = (error: unknown, fallback: string): ApiErrorInfo => {
  if (!axios.isAxiosError(error) || !error.response) {
    return { message: fallback };
  }

  const { status, data } = error.response;
  if (!isRecord(data) || typeof data.message !== 'string') {
    return { message: fallback, status };
  }

  const info: ApiErrorInfo = { message: data.message, status };
  if (Array.isArray(data.fields)) info.fields = data.fields.filter((f): f is string => typeof f === 'string');
  if (typeof data.retryable === 'boolean') info.retryable = data.retryable;
  if (typeof data.unanswered === 'number') info.unanswered = data.unanswered;
  return info;
};

/** Pulls the file name out of a `Content-Disposition: attachment; filename="..."` header. */
export const fileNameFromDisposition = (header: unknown, fallback: string): string => {
  if (typeof header !== 'string') return fallback;
  const match = header.match(/filename[^;=\n]*=((['"]).*?\2|[^;\n]*)/);
  if (match && match[1]) {
    return match[1].replace(/['"]/g, '');
  }
  return fallback;
};

export default apiService;
