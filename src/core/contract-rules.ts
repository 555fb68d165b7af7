/**
 * Request rules every conforming plugin applies before doing any work.
 *
 * Exported so plugin authors can reuse them; the test double applies them
 * to its default behaviors. Each rule throws RpcError INVALID_ARGUMENT.
 */

import type {
  ResourceDescriptor,
  GetActualCostRequest,
  GetRecommendationsRequest,
} from '../types/contract.js';
import { RpcError, StatusCode } from '../types/status.js';

function invalid(message: string): RpcError {
  return new RpcError({ code: StatusCode.INVALID_ARGUMENT, message });
}

/** Require a descriptor with a provider and a resource type. */
export function validateResourceDescriptor(
  resource: ResourceDescriptor | null | undefined,
): ResourceDescriptor {
  if (resource === null || resource === undefined) {
    throw invalid('resource descriptor is required');
  }
  if (typeof resource.provider !== 'string' || resource.provider.length === 0) {
    throw invalid('resource.provider is required');
  }
  if (typeof resource.resource_type !== 'string' || resource.resource_type.length === 0) {
    throw invalid('resource.resource_type is required');
  }
  return resource;
}

function parseTimestamp(value: unknown, field: string): number {
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(`${field} is required`);
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw invalid(`${field} is not a valid timestamp: "${value}"`);
  }
  return ms;
}

/** Require parseable timestamps with `end` strictly after `start`. */
export function validateTimeRange(start: unknown, end: unknown): { startMs: number; endMs: number } {
  const startMs = parseTimestamp(start, 'start');
  const endMs = parseTimestamp(end, 'end');
  if (endMs <= startMs) {
    throw invalid(`end (${String(end)}) must be after start (${String(start)})`);
  }
  return { startMs, endMs };
}

export function validateActualCostRequest(request: GetActualCostRequest): void {
  if (typeof request.resource_id !== 'string' || request.resource_id.length === 0) {
    throw invalid('resource_id is required');
  }
  validateTimeRange(request.start, request.end);
}

export function validateRecommendationsRequest(request: GetRecommendationsRequest): void {
  if (request.page_size !== undefined && request.page_size < 0) {
    throw invalid(`page_size must not be negative, got ${request.page_size}`);
  }
  for (const resource of request.target_resources ?? []) {
    validateResourceDescriptor(resource);
  }
}
