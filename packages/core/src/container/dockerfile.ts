import { systemPackages } from '../dependencies/aggregator.js';
import type { TextRenderer } from '../rendering/renderer.js';
import type { ProjectTemplate } from '../templates/schema.js';
import { exposedPort } from './compose.js';

export const DOCKERFILE_FILENAME = 'Dockerfile';

export function renderDockerfile(template: ProjectTemplate, renderer: TextRenderer): string {
  return renderer.render('project/Dockerfile.hbs', {
    systemPackages: systemPackages(template),
    port: exposedPort(template),
  });
}
