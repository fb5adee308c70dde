import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { Email } from '../../../../email';
import {
  IContactRepository,
  NewContact,
} from '../../../application/interfaces/contact-repository.interface';
import { Contact } from '../../../domain/entities/contact.entity';
import { ContactAlreadyExistsException } from '../../../domain/exceptions/contact-already-exists.exception';
import { ContactOrmEntity } from '../entities/contact.orm-entity';
import { ContactMapper } from '../mappers/contact.mapper';

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    /UNIQUE constraint failed/i.test(error.message)
  );
}

@Injectable()
export class ContactRepository implements IContactRepository {
  private readonly logger = new Logger(ContactRepository.name);

  constructor(
    @InjectRepository(ContactOrmEntity)
    private readonly repo: Repository<ContactOrmEntity>,
  ) {}

  async findByEmail(email: Email): Promise<Contact | null> {
    // Addresses are stored verbatim, so lookup is an exact text match
    const entity = await this.repo
      .createQueryBuilder('c')
      .where('c.email = :email', { email: email.value })
      .getOne();

    if (!entity) {
      this.logger.debug(`No contact found for email ${email}`);
      return null;
    }
    return ContactMapper.toDomain(entity);
  }

  async findAll(): Promise<Contact[]> {
    const entities = await this.repo.find();
    this.logger.debug(`Loaded ${entities.length} contacts`);
    return entities.map((e) => ContactMapper.toDomain(e));
  }

  async create(contact: NewContact): Promise<Contact> {
    try {
      const saved = await this.repo.save(ContactMapper.toOrm(contact));
      return ContactMapper.toDomain(saved);
    } catch (error) {
      // A concurrent registration can pass the use case's lookup; the
      // unique index on email settles it
      if (isUniqueViolation(error)) {
        throw new ContactAlreadyExistsException(contact.email.value);
      }
      throw error;
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.repo.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Contact store health check failed', error);
      return false;
    }
  }
}
