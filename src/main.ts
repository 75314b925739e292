import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import type { MailRelayConfiguration } from './config/config.types';
import { getErrorMessage } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    configureApp(app);

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const relayConfig = config.get<MailRelayConfiguration>('mailrelay');
    if (!relayConfig) {
      logger.error('Configuration namespace "mailrelay" was not loaded');
      process.exit(1);
    }

    if (relayConfig.environment === 'development') {
      app.enableCors();
      logger.log(`RUNNING IN DEVELOPMENT MODE`);
      logConfigurationSummary(relayConfig);

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Mail Relay API')
        .setDescription('Directory, mailbox and relay endpoints of a mail relay node.')
        .setVersion('1.0')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    logger.log(`Starting mail relay node (roles: ${relayConfig.main.roles.join(', ')})`);
    await app.listen(relayConfig.main.port);
    logger.log(`Mail relay node listening on port ${relayConfig.main.port}`);
  } catch (error) {
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error: unknown) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
