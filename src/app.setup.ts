import { ValidationPipe, type INestApplication } from '@nestjs/common';

/**
 * Global request handling shared by the server and the end-to-end tests.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties not in DTO
      forbidNonWhitelisted: true, // Reject requests with extra properties
      transform: true, // Transform payloads to DTO instances
    }),
  );
}
