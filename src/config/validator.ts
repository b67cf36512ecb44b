import Joi from 'joi';
import { RecreateConfig } from '../types';
import { RecreateError } from '../errors';
import { ConfigValidationResult } from './types';

const containerNamePattern = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const envKeyPattern = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

// Joi schema for the gateway container
const gatewayConfigSchema = Joi.object({
  container_name: Joi.string()
    .pattern(containerNamePattern)
    .default('mcp_gateway')
    .messages({
      'string.pattern.base': 'Container name must start with a letter or digit and contain only [a-zA-Z0-9_.-]'
    }),
  image: Joi.string()
    .default('localhost/mcpgateway/mcpgateway:latest'),
  build_context: Joi.string()
    .default('.'),
  dockerfile: Joi.string()
    .optional(),
  volume: Joi.string()
    .pattern(containerNamePattern)
    .default('mcp_gateway_data')
    .messages({
      'string.pattern.base': 'Volume name must start with a letter or digit and contain only [a-zA-Z0-9_.-]'
    }),
  volume_mount: Joi.string()
    .pattern(/^\//)
    .default('/app/data')
    .messages({
      'string.pattern.base': 'Volume mount must be an absolute path inside the container'
    }),
  ports: Joi.array()
    .items(
      Joi.string()
        .pattern(/^(\d{1,5}:)?\d{1,5}(\/(tcp|udp))?$/)
        .messages({
          'string.pattern.base': 'Ports must look like "HOST:CONTAINER" (e.g., "4444:4444")'
        })
    )
    .default(['4444:4444']),
  network: Joi.string()
    .pattern(containerNamePattern)
    .default('gateway_network'),
  env_file: Joi.string()
    .default('.env'),
  legacy_containers: Joi.array()
    .items(Joi.string().pattern(containerNamePattern))
    .default([])
}).default();

// Joi schema for the container tool
const runtimeConfigSchema = Joi.object({
  tool: Joi.string()
    .valid('podman', 'docker')
    .default('podman')
    .messages({
      'any.only': 'Runtime tool must be one of: podman, docker'
    }),
  required_tools: Joi.array()
    .items(Joi.string())
    .default(['podman']),
  command_timeout_seconds: Joi.number()
    .integer()
    .min(1)
    .max(3600)
    .default(900)
    .messages({
      'number.min': 'Command timeout must be at least 1 second',
      'number.max': 'Command timeout must be no more than 3600 seconds'
    })
}).default();

const healthConfigSchema = Joi.object({
  url: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('https://localhost:4444/health')
    .messages({
      'string.uriCustomScheme': 'Health URL must be an http(s) URL'
    }),
  interval_seconds: Joi.number()
    .positive()
    .default(1),
  timeout_seconds: Joi.number()
    .positive()
    .max(1800)
    .default(30)
    .messages({
      'number.max': 'Health timeout must be no more than 1800 seconds'
    }),
  request_timeout_seconds: Joi.number()
    .positive()
    .default(2)
}).default();

const provisioningConfigSchema = Joi.object({
  strategy: Joi.string()
    .valid('http', 'exec')
    .default('http')
    .messages({
      'any.only': 'Provisioning strategy must be one of: http, exec'
    }),
  base_url: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('https://localhost:4444'),
  token_key: Joi.string()
    .pattern(envKeyPattern)
    .default('MCPGATEWAY_BEARER_TOKEN')
    .messages({
      'string.pattern.base': 'Token key must be a valid environment variable name'
    }),
  token_name: Joi.string()
    .default('gateway api'),
  expires_in_days: Joi.number()
    .integer()
    .min(1)
    .default(365),
  admin_email_key: Joi.string()
    .pattern(envKeyPattern)
    .default('PLATFORM_ADMIN_EMAIL'),
  admin_password_key: Joi.string()
    .pattern(envKeyPattern)
    .default('PLATFORM_ADMIN_PASSWORD'),
  bootstrap_script: Joi.string()
    .default('scripts/bootstrap_token.py'),
  bootstrap_interpreter: Joi.string()
    .default('python3')
}).default();

const networkAttachConfigSchema = Joi.object({
  retries: Joi.number()
    .integer()
    .min(0)
    .max(10)
    .default(2),
  retry_delay_seconds: Joi.number()
    .min(0)
    .default(2)
}).default();

const checkConfigSchema = Joi.object({
  name: Joi.string().required(),
  type: Joi.string()
    .valid('http', 'command')
    .required()
    .messages({
      'any.only': 'Check type must be one of: http, command'
    }),
  url: Joi.when('type', {
    is: 'http',
    then: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    otherwise: Joi.forbidden()
  }),
  auth: Joi.when('type', {
    is: 'http',
    then: Joi.boolean().default(false),
    otherwise: Joi.forbidden()
  }),
  command: Joi.when('type', {
    is: 'command',
    then: Joi.string().required(),
    otherwise: Joi.forbidden()
  }),
  args: Joi.when('type', {
    is: 'command',
    then: Joi.array().items(Joi.string()).default([]),
    otherwise: Joi.forbidden()
  })
});

const verificationConfigSchema = Joi.object({
  checks: Joi.array()
    .items(checkConfigSchema)
    .default([
      { name: 'health', type: 'http', url: 'https://localhost:4444/health', auth: false },
      { name: 'authenticated tools listing', type: 'http', url: 'https://localhost:4444/tools', auth: true }
    ])
}).default();

const recreateConfigSchema = Joi.object<RecreateConfig>({
  gateway: gatewayConfigSchema,
  runtime: runtimeConfigSchema,
  health: healthConfigSchema,
  provisioning: provisioningConfigSchema,
  network_attach: networkAttachConfigSchema,
  verification: verificationConfigSchema
}).unknown(false);

const validationOptions: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates a configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = recreateConfigSchema.validate(config ?? {}, validationOptions);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and fills in every default
 * @throws RecreateError (ConfigInvalid) if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): RecreateConfig {
  const { error, value } = recreateConfigSchema.validate(config ?? {}, validationOptions);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new RecreateError('ConfigInvalid', `Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

/**
 * Gets the Joi schema for the configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<RecreateConfig> {
  return recreateConfigSchema;
}
