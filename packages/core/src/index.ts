/**
 * @alphaminer/core
 *
 * Foundational, shared types and interfaces for the alphaminer packages.
 * This package has zero dependencies on other @alphaminer packages.
 */

// ============================================================================
// Results
// ============================================================================
export * from './result';

// ============================================================================
// Domain
// ============================================================================
export * from './domain/settings';
export * from './domain/metrics';
export * from './domain/job';
export * from './domain/alpha';

/**
 * An expression is an opaque string submitted to the remote service
 */
export type Expression = string;

// ============================================================================
// Expressions
// ============================================================================
export * from './expression/validate';

// ============================================================================
// Ports
// ============================================================================
export type { ClockPort } from './ports/clockPort';
export { createSystemClock } from './ports/clockPort';
export type { TextGeneratorPort, TextGenerationRequest } from './ports/textGeneratorPort';
