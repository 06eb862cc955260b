import type { TextRenderer } from '../rendering/renderer.js';

export const DEV_SCRIPT_PATH = 'scripts/dev.sh';

export interface DevCommand {
  name: string;
  description: string;
  /** Shell lines run for the sub-command, in order */
  run: string[];
}

export const DEV_COMMANDS: readonly DevCommand[] = [
  {
    name: 'setup',
    description: 'Setting up development environment...',
    run: [
      'python3 -m venv venv',
      '. venv/bin/activate',
      'pip install -r requirements.txt',
      'echo "Setup complete!"',
    ],
  },
  {
    name: 'start',
    description: 'Starting services...',
    run: ['docker compose up -d'],
  },
  {
    name: 'stop',
    description: 'Stopping services...',
    run: ['docker compose down'],
  },
  {
    name: 'logs',
    description: 'Following service logs...',
    run: ['docker compose logs -f'],
  },
  {
    name: 'test',
    description: 'Running tests...',
    run: ['python3 -m pytest tests/ || echo "No tests found"'],
  },
];

export function renderDevScript(projectName: string, renderer: TextRenderer): string {
  return renderer.render('project/dev.sh.hbs', {
    projectName,
    commands: DEV_COMMANDS,
    usage: `{${DEV_COMMANDS.map((command) => command.name).join('|')}}`,
  });
}
