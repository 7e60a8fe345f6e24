/**
 * HTTP API envelope
 */

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  details?: string[];
  timestamp: Date;
}
