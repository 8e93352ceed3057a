import type { PipelinePhase } from './pipeline/types.js';

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export class PipelineError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InputNotFoundError extends PipelineError {
  readonly inputPath: string;

  constructor(inputPath: string) {
    super(`input file not found at ${inputPath}`, 2);
    this.inputPath = inputPath;
  }
}

export class QualityGateRejectedError extends PipelineError {
  readonly phase: PipelinePhase;
  readonly observedRate: number;
  readonly threshold: number;

  constructor(phase: PipelinePhase, observedRate: number, threshold: number, reason: string) {
    super(`quality gate rejected: ${reason}`, 3);
    this.phase = phase;
    this.observedRate = observedRate;
    this.threshold = threshold;
  }
}
