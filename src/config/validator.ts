import Joi from 'joi';
import { OrchestratorConfig, STACK_NAMES, StackConfig } from '../types/index.js';
import { ConfigValidationResult } from './types.js';

const serviceNamePattern = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const readinessSchema = Joi.alternatives().try(
  Joi.object({ kind: Joi.string().valid('database').required() }),
  Joi.object({
    kind: Joi.string().valid('command').required(),
    command: Joi.array().items(Joi.string().min(1)).min(1).required().messages({
      'array.min': 'Command readiness checks need at least one argument'
    })
  }),
  Joi.object({ kind: Joi.string().valid('health-flag').required() }),
  Joi.object({ kind: Joi.string().valid('running').required() }),
  Joi.object({
    kind: Joi.string().valid('http').required(),
    path: Joi.string().pattern(/^\//).optional()
  })
).messages({
  'alternatives.match': 'Readiness method must be one of: database, command, health-flag, running, http'
});

const serviceSchema = Joi.object({
  name: Joi.string()
    .pattern(serviceNamePattern)
    .required()
    .messages({
      'string.pattern.base': 'Service name must start with a letter or digit and contain only letters, digits, ".", "_" and "-"'
    }),
  role: Joi.string()
    .valid('datastore', 'cache', 'web', 'worker', 'scheduler')
    .required()
    .messages({
      'any.only': 'Service role must be one of: datastore, cache, web, worker, scheduler'
    }),
  phase: Joi.number()
    .integer()
    .min(1)
    .required()
    .messages({
      'number.min': 'Service phase must be 1 or greater'
    }),
  readiness: Joi.array().items(readinessSchema).min(1).required(),
  skip_migrations: Joi.boolean().optional()
});

const stackSchema = Joi.object({
  enabled: Joi.boolean().default(true),
  display_name: Joi.string().required(),
  url: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .required()
    .messages({
      'string.uriCustomScheme': 'Stack URL must be an http(s) URL'
    }),
  health_path: Joi.string().pattern(/^\//).default('/'),
  web_service: Joi.string().pattern(serviceNamePattern).required(),
  database_service: Joi.string().pattern(serviceNamePattern).required(),
  database: Joi.object({
    name: Joi.string().required(),
    user: Joi.string().required()
  }).required(),
  management_command: Joi.array().items(Joi.string().min(1)).min(1).required(),
  settings_module: Joi.string().required(),
  services: Joi.array().items(serviceSchema).min(1).required(),
  persistence: Joi.object({
    kind: Joi.string().valid('bind', 'volume').required(),
    database: Joi.string().required(),
    cache: Joi.array().items(Joi.string()).default([])
  }).required(),
  volumes: Joi.array().items(Joi.string()).default([]),
  network: Joi.string().required(),
  legacy_containers: Joi.array().items(Joi.string()).default([]),
  environment_keys: Joi.array().items(Joi.string().pattern(/^[A-Z_][A-Z0-9_]*$/)).default([]),
  migration_repair: Joi.object({
    app_label: Joi.string().required(),
    migration: Joi.string().required(),
    table: Joi.string().pattern(/^[a-z_][a-z0-9_]*$/).required(),
    legacy_columns: Joi.array().items(Joi.string().pattern(/^[a-z_][a-z0-9_]*$/)).min(1).required()
  }).optional()
});

const orchestratorConfigSchema = Joi.object<OrchestratorConfig>({
  project: Joi.object({
    name: Joi.string()
      .pattern(/^[a-z0-9][a-z0-9_-]*$/)
      .max(63)
      .required()
      .messages({
        'string.pattern.base': 'Project name must be lowercase and contain only letters, digits, "-" and "_"'
      }),
    directory: Joi.string().required(),
    compose_files: Joi.array().items(Joi.string()).default([])
  }).required(),
  timing: Joi.object({
    poll_interval_ms: Joi.number().integer().min(100).required(),
    datastore_timeout_ms: Joi.number().integer().min(1000).required(),
    web_timeout_ms: Joi.number().integer().min(1000).required(),
    worker_timeout_ms: Joi.number().integer().min(1000).required(),
    http_request_timeout_ms: Joi.number().integer().min(100).required()
  }).required(),
  stacks: Joi.object({
    netbox: stackSchema.required(),
    nautobot: stackSchema.required()
  }).required(),
  automation: Joi.object({
    enabled: Joi.boolean().default(false),
    service: Joi.string().pattern(serviceNamePattern).required(),
    url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    health_path: Joi.string().pattern(/^\//).default('/')
  }).required()
}).unknown(false);

/**
 * Cross-field rules Joi cannot express: service references, unique names and
 * the phase ordering between migrating web services and their workers.
 */
export function validateTopology(config: OrchestratorConfig): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const stackName of STACK_NAMES) {
    const stack: StackConfig = config.stacks[stackName];

    for (const service of stack.services) {
      if (seen.has(service.name)) {
        errors.push(`Service "${service.name}" is declared more than once`);
      }
      seen.add(service.name);
    }

    const web = stack.services.find(service => service.name === stack.web_service);
    if (!web || web.role !== 'web') {
      errors.push(`stacks.${stackName}.web_service "${stack.web_service}" must name a service with role "web"`);
    }

    const database = stack.services.find(service => service.name === stack.database_service);
    if (!database || database.role !== 'datastore') {
      errors.push(`stacks.${stackName}.database_service "${stack.database_service}" must name a service with role "datastore"`);
    }

    const webPhase = Math.max(0, ...stack.services.filter(s => s.role === 'web').map(s => s.phase));
    for (const service of stack.services) {
      if ((service.role === 'datastore' || service.role === 'cache') && webPhase > 0 && service.phase >= webPhase) {
        errors.push(`${service.name}: ${service.role} services must start in an earlier phase than the web service`);
      }
      if ((service.role === 'worker' || service.role === 'scheduler') && service.phase <= webPhase) {
        errors.push(`${service.name}: ${service.role} services must start in a later phase than the web service`);
      }
    }
  }

  if (seen.has(config.automation.service)) {
    errors.push(`automation.service "${config.automation.service}" clashes with a stack service`);
  }

  return errors;
}

function runSchema(config: unknown): { value?: OrchestratorConfig; errors: string[] } {
  const { error, value } = orchestratorConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return { errors: error.details.map(detail => detail.message) };
  }

  return { value, errors: validateTopology(value) };
}

/**
 * Validates an orchestrator configuration object against the schema
 * @param config - The configuration object to validate
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { errors } = runSchema(config);
  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Validates and normalizes an orchestrator configuration
 * @returns The configuration with schema defaults applied
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): OrchestratorConfig {
  const { value, errors } = runSchema(config);

  if (!value || errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}
