import { OrchestratorConfig } from '../types/index.js';

/**
 * Built-in topology of the unified compose project. A configuration file only
 * needs to carry the keys it changes; arrays in the file replace these ones.
 */
export function createDefaultConfig(): OrchestratorConfig {
  return {
    project: {
      name: 'unified-docker',
      directory: '.',
      compose_files: []
    },
    timing: {
      poll_interval_ms: 5000,
      datastore_timeout_ms: 120000,
      web_timeout_ms: 900000,
      worker_timeout_ms: 120000,
      http_request_timeout_ms: 5000
    },
    stacks: {
      netbox: {
        enabled: true,
        display_name: 'NetBox',
        url: 'http://localhost:8080',
        health_path: '/login/',
        web_service: 'netbox',
        database_service: 'netbox-postgres',
        database: { name: 'netbox', user: 'netbox' },
        management_command: ['python3', 'manage.py'],
        settings_module: 'netbox.configuration',
        services: [
          { name: 'netbox-postgres', role: 'datastore', phase: 1, readiness: [{ kind: 'database' }] },
          { name: 'netbox-redis', role: 'cache', phase: 1, readiness: [{ kind: 'command', command: ['redis-cli', 'ping'] }] },
          { name: 'netbox-redis-cache', role: 'cache', phase: 1, readiness: [{ kind: 'command', command: ['redis-cli', 'ping'] }] },
          { name: 'netbox', role: 'web', phase: 2, readiness: [{ kind: 'health-flag' }, { kind: 'http' }] },
          { name: 'netbox-worker', role: 'worker', phase: 3, readiness: [{ kind: 'running' }], skip_migrations: true }
        ],
        persistence: {
          kind: 'volume',
          database: 'netbox-postgres-data',
          cache: ['netbox-redis-data', 'netbox-redis-cache-data']
        },
        volumes: [],
        network: 'netbox-net',
        legacy_containers: ['netbox', 'netbox-worker', 'netbox-housekeeping', 'nb-postgres', 'nb-redis'],
        environment_keys: ['DB_HOST', 'DB_NAME', 'DB_USER', 'REDIS_HOST', 'ALLOWED_HOSTS']
      },
      nautobot: {
        enabled: true,
        display_name: 'Nautobot',
        url: 'http://localhost:8081',
        health_path: '/',
        web_service: 'nautobot',
        database_service: 'nautobot-postgres',
        database: { name: 'nautobot', user: 'nautobot' },
        management_command: ['nautobot-server'],
        settings_module: 'nautobot.core.settings',
        services: [
          { name: 'nautobot-postgres', role: 'datastore', phase: 1, readiness: [{ kind: 'database' }] },
          { name: 'nautobot-redis', role: 'cache', phase: 1, readiness: [{ kind: 'command', command: ['redis-cli', 'ping'] }] },
          { name: 'nautobot', role: 'web', phase: 2, readiness: [{ kind: 'health-flag' }, { kind: 'http' }] },
          { name: 'nautobot-worker', role: 'worker', phase: 3, readiness: [{ kind: 'running' }], skip_migrations: true },
          { name: 'nautobot-beat', role: 'scheduler', phase: 3, readiness: [{ kind: 'running' }], skip_migrations: true }
        ],
        persistence: {
          kind: 'bind',
          database: 'postgres',
          cache: ['redis']
        },
        volumes: ['nautobot-static', 'nautobot-media'],
        network: 'nautobot-net',
        legacy_containers: ['nautobot', 'nautobot-worker', 'nautobot-beat'],
        environment_keys: [
          'NAUTOBOT_DB_HOST',
          'NAUTOBOT_DB_NAME',
          'NAUTOBOT_DB_USER',
          'NAUTOBOT_DB_PORT',
          'NAUTOBOT_REDIS_HOST',
          'NAUTOBOT_REDIS_PORT',
          'NAUTOBOT_ALLOWED_HOSTS',
          'NAUTOBOT_DEBUG'
        ],
        migration_repair: {
          app_label: 'tenancy',
          migration: '0003_mptt_to_tree_queries',
          table: 'tenancy_tenantgroup',
          legacy_columns: ['level', 'lft', 'rght', 'tree_id']
        }
      }
    },
    automation: {
      enabled: false,
      service: 'nornir-automation',
      url: 'http://localhost:8082',
      health_path: '/api/docs/'
    }
  };
}
