import { ApiProperty } from '@nestjs/swagger';
import { Contact } from '../../../domain/entities/contact.entity';

export class ContactResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'John Doe' })
  name!: string;

  @ApiProperty({ example: 'john@example.com' })
  email!: string;

  @ApiProperty({ example: '2026-02-22T10:00:00.000Z' })
  createdAt!: string;

  static fromDomain(contact: Contact): ContactResponseDto {
    const dto = new ContactResponseDto();
    dto.id = contact.id;
    dto.name = contact.name;
    dto.email = contact.email.value;
    dto.createdAt = contact.createdAt.toISOString();
    return dto;
  }
}
