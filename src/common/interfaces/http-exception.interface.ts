export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  code?: string;
  error?: string;
  timestamp?: string;
  path?: string;
  [detail: string]: unknown;
}
