import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { appServiceName, buildComposeDefinition, exposedPort, renderCompose } from '../compose.js';
import { renderDockerfile } from '../dockerfile.js';
import { TextRenderer } from '../../rendering/renderer.js';
import { createBuiltinRegistry } from '../../templates/builtin.js';
import { validateTemplate } from '../../templates/parser.js';

describe('compose definition', () => {
  const registry = createBuiltinRegistry();

  it('should name the app service after the project', () => {
    const definition = buildComposeDefinition(registry.lookup('basic'), 'demo');

    expect(definition).toEqual({
      services: {
        demo: {
          build: '.',
          ports: ['8080:8080'],
          environment: { ENVIRONMENT: 'development', LOG_LEVEL: 'INFO' },
          volumes: ['./logs:/app/logs', './data:/app/data'],
        },
      },
    });
  });

  it('should make the app depend on supporting services', () => {
    const definition = buildComposeDefinition(registry.lookup('security'), 'cam');

    expect(Object.keys(definition.services)).toEqual(['cam', 'mqtt', 'redis']);
    expect(definition.services.cam.depends_on).toEqual(['mqtt', 'redis']);
    expect(definition.services.cam.environment).toEqual({
      ENVIRONMENT: 'development',
      MODEL_PATH: '/models/yolov8n.pt',
      MQTT_BROKER: 'mqtt://mqtt:1883',
      REDIS_URL: 'redis://redis:6379',
    });
    expect(definition.services.mqtt).toEqual({
      image: 'eclipse-mosquitto:2',
      ports: ['1883:1883'],
    });
    expect(definition.services.redis).toEqual({ image: 'redis:7-alpine', ports: ['6379:6379'] });
  });

  it('should suffix the app service when a supporting service has the project name', () => {
    const definition = buildComposeDefinition(registry.lookup('security'), 'redis');

    expect(Object.keys(definition.services)).toEqual(['redis-app', 'mqtt', 'redis']);
    expect(definition.services['redis-app']).toMatchObject({
      build: '.',
      depends_on: ['mqtt', 'redis'],
    });
    expect(definition.services.redis).toEqual({ image: 'redis:7-alpine', ports: ['6379:6379'] });
  });

  it('should count up until the app service name is free', () => {
    const template = validateTemplate({
      ...registry.lookup('basic'),
      docker_services: ['app', 'cache', 'cache-app'],
    });

    expect(appServiceName(template, 'cache')).toBe('cache-app-2');
    expect(appServiceName(template, 'demo')).toBe('demo');
  });

  it('should fall back to name:latest for unknown services', () => {
    const template = validateTemplate({
      ...registry.lookup('basic'),
      docker_services: ['app', 'minio'],
    });

    expect(buildComposeDefinition(template, 'demo').services.minio).toEqual({
      image: 'minio:latest',
    });
  });

  it('should not share catalog objects between definitions', () => {
    const first = buildComposeDefinition(registry.lookup('iot'), 'one');
    first.services.postgres.ports?.push('15432:5432');

    const second = buildComposeDefinition(registry.lookup('iot'), 'two');
    expect(second.services.postgres.ports).toEqual(['5432:5432']);
  });

  it('should render parseable YAML', () => {
    const parsed: unknown = parse(renderCompose(registry.lookup('iot'), 'sensors'));

    expect(parsed).toEqual(buildComposeDefinition(registry.lookup('iot'), 'sensors'));
  });

  it('should expose the HTTP trigger port or 8080', () => {
    const custom = validateTemplate({
      ...registry.lookup('basic'),
      triggers: [{ id: 'hook', type: 'http', port: 9000, enabled: true }],
    });

    expect(exposedPort(custom)).toBe(9000);
    expect(exposedPort(registry.lookup('iot'))).toBe(8080);
  });
});

describe('renderDockerfile', () => {
  const registry = createBuiltinRegistry();
  const renderer = new TextRenderer();

  it('should install baseline and template system packages', () => {
    const lines = renderDockerfile(registry.lookup('basic'), renderer).split('\n');

    expect(lines[0]).toBe('FROM python:3.11-slim');
    expect(lines).toContain('    curl build-essential curl git && \\');
  });

  it('should expose the pipeline port and start the runner', () => {
    const text = renderDockerfile(registry.lookup('iot'), renderer);

    expect(text.endsWith('EXPOSE 8080\nCMD ["python", "-m", "pipeline_runner", "pipeline.yaml"]\n')).toBe(true);
  });
});
