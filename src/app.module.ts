import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { ContactModule } from './contact/contact.module';
import { ContactOrmEntity } from './contact/infrastructure/persistence/entities/contact.orm-entity';
import { loadAppConfig } from './shared/config/app.config';

@Module({
  imports: [
    // Structured logging
    LoggerModule.forRootAsync({
      useFactory: () => {
        const config = loadAppConfig();
        return {
          pinoHttp: {
            transport: config.prettyLogs
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
            level: config.logLevel,
          },
        };
      },
    }),

    // SQLite contact store
    TypeOrmModule.forRootAsync({
      useFactory: () => ({
        type: 'sqlite',
        database: loadAppConfig().databasePath,
        entities: [ContactOrmEntity],
        synchronize: true, // Auto-create schema (dev only)
      }),
    }),

    ContactModule,
  ],
})
export class AppModule {}
