import { INestApplication, RequestMethod } from '@nestjs/common';
import { Settings } from './config/settings';

/** Routes mail clients and probes reach without the API prefix. */
const PUBLIC_ROUTES = [
  { path: '/', method: RequestMethod.GET },
  { path: 'health', method: RequestMethod.ALL },
  { path: 'health/(.*)', method: RequestMethod.ALL },
  { path: 'track/(.*)', method: RequestMethod.ALL },
  { path: 'unsubscribe', method: RequestMethod.ALL },
  { path: 'unsubscribe/(.*)', method: RequestMethod.ALL },
  { path: 'verify', method: RequestMethod.ALL },
  { path: 'verify/(.*)', method: RequestMethod.ALL },
];

export function configureApp(app: INestApplication, settings: Settings): void {
  app.setGlobalPrefix(settings.apiPrefix, { exclude: PUBLIC_ROUTES });
  app.enableCors();
  app.enableShutdownHooks();
}
