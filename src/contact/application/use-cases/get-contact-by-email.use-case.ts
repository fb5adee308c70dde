import { Inject, Injectable } from '@nestjs/common';
import { Email } from '../../../email';
import { IContactRepository } from '../interfaces/contact-repository.interface';
import { Contact } from '../../domain/entities/contact.entity';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class GetContactByEmailUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CONTACT_REPOSITORY)
    private readonly contacts: IContactRepository,
  ) {}

  async execute(email: Email): Promise<Contact> {
    const contact = await this.contacts.findByEmail(email);
    if (!contact) {
      throw new ContactNotFoundException(email.value);
    }
    return contact;
  }
}
