/**
 * gRPC status helpers for Cloud Billing API errors
 */

export const GRPC_PERMISSION_DENIED = 7;

export function grpcCode(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Server-provided details when present, otherwise the error message
 */
export function grpcMessage(error: unknown): string {
  if (error && typeof error === 'object' && 'details' in error && typeof error.details === 'string' && error.details) {
    return error.details;
  }
  return error instanceof Error ? error.message : String(error);
}

export function isPermissionDenied(error: unknown): boolean {
  return grpcCode(error) === GRPC_PERMISSION_DENIED;
}

/**
 * PERMISSION_DENIED is also what the API answers while it is disabled or
 * still propagating after being enabled
 */
export function looksLikeDisabledApi(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes('api has not been used') || lower.includes('service is disabled');
}
