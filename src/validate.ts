import { dimensionMismatchError, validationError } from './errors.js';

export function assertDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension < 1) {
    throw validationError(`dimension must be a positive integer, got ${dimension}`, { dimension });
  }
}

export function assertIterations(maxIterations: number): void {
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    throw validationError(
      `maxIterations must be a non-negative integer, got ${maxIterations}`,
      { maxIterations }
    );
  }
}

export function assertStart(start: readonly number[], dimension: number): void {
  if (start.length !== dimension) {
    throw dimensionMismatchError(dimension, start.length);
  }
  for (let i = 0; i < start.length; i++) {
    if (!Number.isFinite(start[i])) {
      throw validationError(`start[${i}] must be finite, got ${start[i]}`, { index: i, value: start[i] });
    }
  }
}

export function assertStep(step: number): void {
  if (!Number.isFinite(step) || step === 0) {
    throw validationError(`step must be finite and non-zero, got ${step}`, { step });
  }
}

export interface Coefficients {
  alpha: number;
  gamma: number;
  rho: number;
  sigma: number;
  convergenceThreshold: number;
  stallLimit: number;
}

export function assertCoefficients(c: Coefficients): void {
  const positive = { alpha: c.alpha, gamma: c.gamma, rho: c.rho, sigma: c.sigma };
  for (const [name, value] of Object.entries(positive)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw validationError(`${name} must be finite and positive, got ${value}`, { [name]: value });
    }
  }
  if (!Number.isFinite(c.convergenceThreshold) || c.convergenceThreshold < 0) {
    throw validationError(
      `convergenceThreshold must be finite and non-negative, got ${c.convergenceThreshold}`,
      { convergenceThreshold: c.convergenceThreshold }
    );
  }
  if (!Number.isInteger(c.stallLimit) || c.stallLimit < 1) {
    throw validationError(
      `stallLimit must be a positive integer, got ${c.stallLimit}`,
      { stallLimit: c.stallLimit }
    );
  }
}
