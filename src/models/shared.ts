/**
 * Shared types used across the assessment service.
 */

export type Classification = 'compliant' | 'partial' | 'non_compliant';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  timestamp: string;
}

export function apiSuccess<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
}

export function apiError(error: string, code?: string): ApiResponse {
  return {
    success: false,
    error,
    code,
    timestamp: new Date().toISOString(),
  };
}
