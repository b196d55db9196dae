/**
 * =============================================================================
 * CORE MODULE - Central Exports
 * =============================================================================
 *
 * Single entry point for all core functionality.
 *
 * USAGE:
 * ```typescript
 * import { RouteGuideMethod, AppError, toServiceError } from './core';
 * ```
 *
 * =============================================================================
 */

// Constants & Enums
export * from './constants';

// Error Classes
export * from './errors/AppError';

// Environment Validation
export * from './config/env.validation';
