import { INestApplication, ValidationPipe } from '@nestjs/common';

/** Global pipes shared by the server and the HTTP specs. */
export function setupApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  return app;
}
