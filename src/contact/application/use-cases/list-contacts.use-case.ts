import { Inject, Injectable } from '@nestjs/common';
import { Email } from '../../../email';
import { IContactRepository } from '../interfaces/contact-repository.interface';
import { Contact } from '../../domain/entities/contact.entity';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

@Injectable()
export class ListContactsUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CONTACT_REPOSITORY)
    private readonly contacts: IContactRepository,
  ) {}

  async execute(): Promise<Contact[]> {
    const contacts = await this.contacts.findAll();
    return [...contacts].sort((a, b) => Email.compare(a.email, b.email));
  }
}
