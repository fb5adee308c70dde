import { IsString, MaxLength, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { Email, EmailProperty } from '../../../../email';

export class RegisterContactRequestDto {
  @ApiProperty({ example: 'John Doe', minLength: 1, maxLength: 200 })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  name!: string;

  @ApiProperty({
    type: String,
    format: 'email',
    description: 'Stored exactly as given; no case folding or trimming',
    example: 'john@example.com',
  })
  @EmailProperty()
  email!: Email;
}
