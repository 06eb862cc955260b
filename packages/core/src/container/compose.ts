import { stringify } from 'yaml';
import { findHttpTrigger, DEFAULT_HTTP_PORT } from '../templates/parser.js';
import type { ProjectTemplate } from '../templates/schema.js';

export const COMPOSE_FILENAME = 'docker-compose.yml';

/**
 * Service name in templates that stands for the project's own image
 */
export const APP_SERVICE = 'app';

export interface ComposeService {
  build?: string;
  image?: string;
  ports?: string[];
  environment?: Record<string, string>;
  volumes?: string[];
  depends_on?: string[];
}

export interface ComposeDefinition {
  services: Record<string, ComposeService>;
}

/**
 * Known supporting services. Anything else becomes `<name>:latest`.
 */
export const SERVICE_CATALOG: Readonly<Record<string, ComposeService>> = {
  redis: {
    image: 'redis:7-alpine',
    ports: ['6379:6379'],
  },
  mqtt: {
    image: 'eclipse-mosquitto:2',
    ports: ['1883:1883'],
  },
  postgres: {
    image: 'postgres:16-alpine',
    ports: ['5432:5432'],
    environment: {
      POSTGRES_USER: 'postgres',
      POSTGRES_PASSWORD: 'postgres',
    },
  },
};

/**
 * Compose key of the project's own service
 *
 * The project name, or `<name>-app` (then `<name>-app-2`...) when a
 * supporting service already uses it.
 */
export function appServiceName(template: ProjectTemplate, projectName: string): string {
  const taken = new Set(template.docker_services.filter((service) => service !== APP_SERVICE));
  if (!taken.has(projectName)) {
    return projectName;
  }

  let candidate = `${projectName}-app`;
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${projectName}-app-${n}`;
  }
  return candidate;
}

/**
 * Build the compose definition for a template
 *
 * `app` becomes a service keyed by {@link appServiceName}, built from the
 * local Dockerfile and depending on every other listed service.
 */
export function buildComposeDefinition(
  template: ProjectTemplate,
  projectName: string
): ComposeDefinition {
  const supporting = template.docker_services.filter((service) => service !== APP_SERVICE);
  const appName = appServiceName(template, projectName);
  const services: Record<string, ComposeService> = {};

  for (const service of template.docker_services) {
    if (service === APP_SERVICE) {
      services[appName] = appService(template, supporting);
    } else {
      services[service] = supportingService(service);
    }
  }

  return { services };
}

export function renderCompose(template: ProjectTemplate, projectName: string): string {
  return stringify(buildComposeDefinition(template, projectName), { indent: 2, lineWidth: 0 });
}

/**
 * Port the app container exposes: first HTTP trigger, or the default
 */
export function exposedPort(template: ProjectTemplate): number {
  return findHttpTrigger(template)?.port ?? DEFAULT_HTTP_PORT;
}

function appService(template: ProjectTemplate, dependsOn: string[]): ComposeService {
  const port = exposedPort(template);
  const service: ComposeService = {
    build: '.',
    ports: [`${port}:${port}`],
    environment: {
      ENVIRONMENT: 'development',
      ...template.environment_vars,
    },
    volumes: ['./logs:/app/logs', './data:/app/data'],
  };

  if (dependsOn.length > 0) {
    service.depends_on = dependsOn;
  }

  return service;
}

function supportingService(name: string): ComposeService {
  const known = SERVICE_CATALOG[name];
  if (!known) {
    return { image: `${name}:latest` };
  }

  return structuredClone(known);
}
