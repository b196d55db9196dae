/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * import { validateAndLogEnvironment } from './core';
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPort = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) >= 0 && parseInt(v, 10) < 65536;
const isBoolean = (v: string): boolean => ['true', 'false'].includes(v.toLowerCase());

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'GRPC_HOST',
    required: false,
    default: '0.0.0.0',
    description: 'gRPC bind address'
  },
  {
    name: 'GRPC_PORT',
    required: false,
    default: '50051',
    validator: isPort,
    description: 'gRPC port number (0 picks a free port)'
  },
  {
    name: 'GRPC_REFLECTION_ENABLED',
    required: false,
    default: 'true',
    validator: isBoolean,
    description: 'Register gRPC server reflection'
  },
  {
    name: 'PROTO_PATH',
    required: false,
    default: 'proto/route_guide.proto',
    description: 'Path to the RouteGuide proto definition'
  },
  {
    name: 'SHUTDOWN_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: (v) => /^\d+$/.test(v),
    description: 'Grace period for in-flight calls on shutdown'
  },

  // ==========================================================================
  // HEALTH / METRICS
  // ==========================================================================
  {
    name: 'HEALTH_SERVER_ENABLED',
    required: false,
    default: 'true',
    validator: isBoolean,
    description: 'Serve /health and /metrics over HTTP'
  },
  {
    name: 'HTTP_PORT',
    required: false,
    default: '8080',
    validator: isPort,
    description: 'Health/metrics HTTP port'
  },

  // ==========================================================================
  // DATA
  // ==========================================================================
  {
    name: 'FEATURES_FILE',
    required: false,
    default: 'data/route_guide_db.json',
    description: 'JSON file with the known features'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'debug',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    // Check if required
    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    // Production-specific checks
    if (isProduction) {
      if (envVar.name === 'GRPC_REFLECTION_ENABLED' && value?.toLowerCase() !== 'false') {
        result.warnings.push('GRPC_REFLECTION_ENABLED should be false in production');
      }
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      result.loaded[envVar.name] = finalValue;
    }
  }

  if (
    result.loaded.HEALTH_SERVER_ENABLED?.toLowerCase() !== 'false' &&
    result.loaded.HTTP_PORT !== undefined &&
    result.loaded.HTTP_PORT === result.loaded.GRPC_PORT &&
    result.loaded.GRPC_PORT !== '0'
  ) {
    result.valid = false;
    result.errors.push(`HTTP_PORT and GRPC_PORT must differ (both are ${result.loaded.GRPC_PORT})`);
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): ValidationResult {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('✅ Environment validation passed', {
      mode: result.loaded.NODE_ENV,
      grpcPort: result.loaded.GRPC_PORT,
      httpPort: result.loaded.HEALTH_SERVER_ENABLED === 'false' ? 'disabled' : result.loaded.HTTP_PORT,
      featuresFile: result.loaded.FEATURES_FILE
    });
  }

  // Exit in production if validation failed
  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }

  return result;
}
