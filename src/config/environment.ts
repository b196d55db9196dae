/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - Relative paths resolve against the working directory
 * =============================================================================
 */

import dotenv from 'dotenv';
import path from 'path';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Resolve a file path from the environment against the working directory
 */
function getPath(key: string, defaultValue: string): string {
  return path.resolve(process.cwd(), getOptional(key, defaultValue));
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  nodeEnv,

  // gRPC listener
  grpc: {
    host: getOptional('GRPC_HOST', '0.0.0.0'),
    port: getNumber('GRPC_PORT', 50051),
    protoPath: getPath('PROTO_PATH', 'proto/route_guide.proto'),
    reflectionEnabled: getBoolean('GRPC_REFLECTION_ENABLED', true),
  },

  // Health + metrics side-car
  http: {
    enabled: getBoolean('HEALTH_SERVER_ENABLED', true),
    port: getNumber('HTTP_PORT', 8080),
  },

  // Feature dataset loaded once at startup
  featuresFile: getPath('FEATURES_FILE', 'data/route_guide_db.json'),

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  shutdownTimeoutMs: getNumber('SHUTDOWN_TIMEOUT_MS', 10000),

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.shutdownTimeoutMs <= 0) {
    errors.push(`SHUTDOWN_TIMEOUT_MS must be positive (got ${config.shutdownTimeoutMs})`);
  }

  // Production-specific checks
  if (config.isProduction) {
    if (config.logLevel === 'debug') {
      warnings.push('LOG_LEVEL is "debug" - per-message stream logging is verbose in production');
    }
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
