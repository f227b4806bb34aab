/**
 * Core utilities for cratedoc
 *
 * This package provides shared utilities for:
 * - Loading and validating cratedoc.json
 * - The error types raised across the pipeline
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
