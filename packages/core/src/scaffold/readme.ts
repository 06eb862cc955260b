import type { TextRenderer } from '../rendering/renderer.js';
import { titleCase } from '../rendering/renderer.js';
import { findHttpTrigger } from '../templates/parser.js';
import type { ProjectTemplate } from '../templates/schema.js';
import { DEV_COMMANDS, DEV_SCRIPT_PATH } from './dev-script.js';

export const README_FILENAME = 'README.md';
export const GITIGNORE_FILENAME = '.gitignore';

const SAMPLE_PAYLOAD = '{"message": "Hello pipeline!"}';

/**
 * Shell command that exercises the pipeline once it is running
 */
export function pipelineTestCommand(template: ProjectTemplate): string {
  const http = findHttpTrigger(template);

  if (!http) {
    return `./${DEV_SCRIPT_PATH} test`;
  }

  return `curl -X POST http://localhost:${http.port}${http.path} -H "Content-Type: application/json" -d '${SAMPLE_PAYLOAD}'`;
}

export function renderReadme(
  template: ProjectTemplate,
  projectName: string,
  renderer: TextRenderer
): string {
  return renderer.render('project/README.md.hbs', {
    title: titleCase(projectName),
    projectName,
    description: template.description,
    testCommand: pipelineTestCommand(template),
    processors: template.processors,
    commands: DEV_COMMANDS,
  });
}

/**
 * Instructions shown to the user after a successful run
 */
export function buildNextSteps(projectPath: string, template: ProjectTemplate): string[] {
  return [
    `cd ${projectPath}`,
    `./${DEV_SCRIPT_PATH} setup`,
    `./${DEV_SCRIPT_PATH} start`,
    `Test: ${pipelineTestCommand(template)}`,
  ];
}
