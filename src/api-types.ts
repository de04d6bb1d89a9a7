/**
 * API error response format
 */
export interface ApiErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

/**
 * API success response format
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

export interface ListResponse<T> {
  success: true;
  data: T[];
  total: number;
  timestamp: string;
}
