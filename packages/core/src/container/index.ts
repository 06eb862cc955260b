export {
  buildComposeDefinition,
  renderCompose,
  exposedPort,
  SERVICE_CATALOG,
  APP_SERVICE,
  COMPOSE_FILENAME,
  type ComposeDefinition,
  type ComposeService,
} from './compose.js';
export { renderDockerfile, DOCKERFILE_FILENAME } from './dockerfile.js';
