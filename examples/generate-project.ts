/**
 * Programmatic Project Generation Example
 *
 * This example demonstrates how to:
 * - Configure the ProjectGenerator from environment variables
 * - Listen for step events
 * - Generate a project and validate the result
 */

import {
  configFromEnv,
  NodeFileSystem,
  ProjectGenerator,
  validateProject,
} from '../packages/core/src/index.js';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Load environment variables from parent directory
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: join(__dirname, '..', '.env') });

async function main() {
  console.log('🚀 Pipegen - Programmatic Generation Example\n');

  const [projectName = 'camera-watch', templateName = 'security'] = process.argv.slice(2);
  const fileSystem = new NodeFileSystem();

  const generator = new ProjectGenerator({
    outputDir: join(__dirname, 'output'),
    ...configFromEnv(),
    fileSystem,
  });

  generator.on('step:start', (step) => console.log(`⏳ ${step}...`));
  generator.on('step:complete', (step, files) => {
    console.log(`✓ ${step}${files.length > 0 ? `: ${files.join(', ')}` : ''}`);
  });
  generator.on('processor:skipped', ({ id, type }) => {
    console.log(`⚠️  ${id} skipped (type '${type}' has no stub generator)`);
  });

  const result = await generator.generate(projectName, templateName);

  console.log(`\n✅ Generated ${result.files.length} files in ${result.duration}ms`);
  console.log(`   ${result.projectPath}\n`);

  const report = await validateProject(result.projectPath, fileSystem);
  console.log(`🔍 Validation: ${report.passed ? 'passed' : 'failed'} (${report.warnings} warnings)`);

  console.log('\nNext steps:');
  result.nextSteps.forEach((step) => console.log(`  ${step}`));
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
