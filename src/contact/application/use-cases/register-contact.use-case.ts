import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IContactRepository,
  NewContact,
} from '../interfaces/contact-repository.interface';
import { Contact } from '../../domain/entities/contact.entity';
import { ContactAlreadyExistsException } from '../../domain/exceptions/contact-already-exists.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class RegisterContactUseCase {
  private readonly logger = new Logger(RegisterContactUseCase.name);

  constructor(
    @Inject(INJECTION_TOKENS.CONTACT_REPOSITORY)
    private readonly contacts: IContactRepository,
  ) {}

  async execute(input: NewContact): Promise<Contact> {
    const existing = await this.contacts.findByEmail(input.email);
    if (existing) {
      throw new ContactAlreadyExistsException(input.email.value);
    }

    const contact = await this.contacts.create({
      name: input.name,
      email: input.email,
    });
    this.logger.log(`Registered contact ${contact.id} <${contact.email}>`);
    return contact;
  }
}
