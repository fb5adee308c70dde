import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TerminusModule } from '@nestjs/terminus';

// Application - Use Cases
import { RegisterContactUseCase } from './application/use-cases/register-contact.use-case';
import { GetContactByEmailUseCase } from './application/use-cases/get-contact-by-email.use-case';
import { ListContactsUseCase } from './application/use-cases/list-contacts.use-case';
import { CheckHealthUseCase } from './application/use-cases/check-health.use-case';

// Infrastructure - Persistence
import { ContactOrmEntity } from './infrastructure/persistence/entities/contact.orm-entity';
import { ContactRepository } from './infrastructure/persistence/repositories/contact.repository';

// Presentation
import { ContactController } from './presentation/controllers/contact.controller';
import { HealthController } from './presentation/controllers/health.controller';

// Shared
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([ContactOrmEntity]), TerminusModule],
  controllers: [ContactController, HealthController],
  providers: [
    RegisterContactUseCase,
    GetContactByEmailUseCase,
    ListContactsUseCase,
    CheckHealthUseCase,

    // Infrastructure: bind interface → implementation
    {
      provide: INJECTION_TOKENS.CONTACT_REPOSITORY,
      useClass: ContactRepository,
    },
  ],
})
export class ContactModule {}
