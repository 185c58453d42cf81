import type { z } from 'zod';

export type EnergyErrorKind = 'network' | 'malformed' | 'stale';

export abstract class EnergyApiError extends Error {
  abstract readonly kind: EnergyErrorKind;
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.path = path;
  }
}

// Request rejected, timed out or answered with a non-OK status.
export class NetworkFailure extends EnergyApiError {
  readonly kind = 'network';
  readonly status?: number;

  constructor(path: string, reason: string, status?: number) {
    super(path, `Request to ${path} failed: ${reason}`);
    this.name = 'NetworkFailure';
    this.status = status;
  }
}

export class MalformedResponse extends EnergyApiError {
  readonly kind = 'malformed';
  readonly issues: z.ZodIssue[];

  constructor(path: string, reason: string, issues: z.ZodIssue[] = []) {
    super(path, `Malformed response from ${path}: ${reason}`);
    this.name = 'MalformedResponse';
    this.issues = issues;
  }
}

// A response that belongs to a superseded request. Never shown to the user.
export class StaleResponse extends EnergyApiError {
  readonly kind = 'stale';
  readonly generation: number;
  readonly currentGeneration: number;

  constructor(path: string, generation: number, currentGeneration: number) {
    super(path, `Dropped stale response for ${path} (generation ${generation}, current ${currentGeneration})`);
    this.name = 'StaleResponse';
    this.generation = generation;
    this.currentGeneration = currentGeneration;
  }
}

export const isStaleResponse = (error: unknown): error is StaleResponse => error instanceof StaleResponse;
