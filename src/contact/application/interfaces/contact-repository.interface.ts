import { Email } from '../../../email';
import { Contact } from '../../domain/entities/contact.entity';

export interface NewContact {
  name: string;
  email: Email;
}

/**
 * What use cases need from contact storage.
 *
 * Abstract class rather than interface: interfaces are erased at runtime
 * and cannot serve as NestJS DI tokens.
 */
export abstract class IContactRepository {
  abstract findByEmail(email: Email): Promise<Contact | null>;
  abstract findAll(): Promise<Contact[]>;
  abstract create(contact: NewContact): Promise<Contact>;
  abstract isHealthy(): Promise<boolean>;
}
