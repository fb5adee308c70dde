import { Contact } from '../../../domain/entities/contact.entity';
import { NewContact } from '../../../application/interfaces/contact-repository.interface';
import { ContactOrmEntity } from '../entities/contact.orm-entity';

export class ContactMapper {
  static toDomain(orm: ContactOrmEntity): Contact {
    return new Contact({
      id: orm.id,
      name: orm.name,
      email: orm.email,
      createdAt: orm.createdAt,
    });
  }

  static toOrm(contact: NewContact): ContactOrmEntity {
    const orm = new ContactOrmEntity();
    orm.name = contact.name;
    orm.email = contact.email;
    return orm;
  }
}
