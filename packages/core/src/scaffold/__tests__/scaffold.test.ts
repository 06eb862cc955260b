import { describe, it, expect } from 'vitest';
import { renderDevScript } from '../dev-script.js';
import { buildNextSteps, pipelineTestCommand, renderReadme } from '../readme.js';
import { TextRenderer } from '../../rendering/renderer.js';
import { createBuiltinRegistry } from '../../templates/builtin.js';

const renderer = new TextRenderer();
const registry = createBuiltinRegistry();

describe('renderDevScript', () => {
  it('should render one case branch per command', () => {
    expect(renderDevScript('demo', renderer)).toBe(
      [
        '#!/usr/bin/env bash',
        'set -e',
        '',
        "PROJECT_NAME='demo'",
        '',
        'case "${1:-help}" in',
        '    setup)',
        "        echo 'Setting up development environment...'",
        '        python3 -m venv venv',
        '        . venv/bin/activate',
        '        pip install -r requirements.txt',
        '        echo "Setup complete!"',
        '        ;;',
        '    start)',
        "        echo 'Starting services...'",
        '        docker compose up -d',
        '        ;;',
        '    stop)',
        "        echo 'Stopping services...'",
        '        docker compose down',
        '        ;;',
        '    logs)',
        "        echo 'Following service logs...'",
        '        docker compose logs -f',
        '        ;;',
        '    test)',
        "        echo 'Running tests...'",
        '        python3 -m pytest tests/ || echo "No tests found"',
        '        ;;',
        '    *)',
        '        echo "Usage: $0 {setup|start|stop|logs|test}"',
        '        ;;',
        'esac',
        '',
      ].join('\n')
    );
  });

  it('should single-quote the project name', () => {
    expect(renderDevScript('x$(touch marker)', renderer)).toContain("PROJECT_NAME='x$(touch marker)'\n");
    expect(renderDevScript('`id`', renderer)).toContain("PROJECT_NAME='`id`'\n");
  });

  it('should escape embedded single quotes', () => {
    expect(renderDevScript("it's", renderer)).toContain("PROJECT_NAME='it'\\''s'\n");
  });
});

describe('pipelineTestCommand', () => {
  it('should post to the HTTP trigger', () => {
    expect(pipelineTestCommand(registry.lookup('security'))).toBe(
      `curl -X POST http://localhost:8080/camera/frame -H "Content-Type: application/json" -d '{"message": "Hello pipeline!"}'`
    );
  });

  it('should fall back to the dev script without an HTTP trigger', () => {
    expect(pipelineTestCommand(registry.lookup('iot'))).toBe('./scripts/dev.sh test');
  });
});

describe('buildNextSteps', () => {
  it('should list cd, setup, start and test', () => {
    expect(buildNextSteps('/work/demo', registry.lookup('basic'))).toEqual([
      'cd /work/demo',
      './scripts/dev.sh setup',
      './scripts/dev.sh start',
      `Test: curl -X POST http://localhost:8080/webhook -H "Content-Type: application/json" -d '{"message": "Hello pipeline!"}'`,
    ]);
  });
});

describe('renderReadme', () => {
  it('should title the README after the project', () => {
    const lines = renderReadme(registry.lookup('basic'), 'camera-watch', renderer).split('\n');

    expect(lines[0]).toBe('# Camera Watch');
    expect(lines[2]).toBe('Simple HTTP to file pipeline');
  });

  it('should table processors with their dependencies', () => {
    const lines = renderReadme(registry.lookup('security'), 'cam', renderer).split('\n');

    expect(lines).toContain('| `object_detection` | python | - |');
    expect(lines).toContain('| `threat_analysis` | go | object_detection |');
  });

  it('should list the dev script commands', () => {
    const lines = renderReadme(registry.lookup('iot'), 'sensors', renderer).split('\n');

    expect(lines).toContain('- `./scripts/dev.sh setup` - Setting up development environment...');
    expect(lines).toContain('   ./scripts/dev.sh test');
    expect(lines).toContain('sensors/');
  });
});
