import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Email, InvalidEmailException } from '../../../email';
import { RegisterContactUseCase } from '../../application/use-cases/register-contact.use-case';
import { GetContactByEmailUseCase } from '../../application/use-cases/get-contact-by-email.use-case';
import { ListContactsUseCase } from '../../application/use-cases/list-contacts.use-case';
import { RegisterContactRequestDto } from '../dto/request/register-contact.request.dto';
import { ContactResponseDto } from '../dto/response/contact.response.dto';
import { ApiErrorDto } from '../dto/response/api-response.dto';
import { ResponseWrapperInterceptor } from '../../../shared/interceptors/response-wrapper.interceptor';

@ApiTags('contacts')
@Controller('contacts')
@UseInterceptors(ResponseWrapperInterceptor)
export class ContactController {
  constructor(
    private readonly registerContact: RegisterContactUseCase,
    private readonly getContactByEmail: GetContactByEmailUseCase,
    private readonly listContacts: ListContactsUseCase,
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Register a contact',
    description:
      'The email is validated structurally and stored verbatim. Addresses are unique by exact text.',
  })
  @ApiResponse({ status: 201, type: ContactResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Invalid email or name',
    type: ApiErrorDto,
  })
  @ApiResponse({
    status: 409,
    description: 'A contact with this email already exists',
    type: ApiErrorDto,
  })
  async register(
    @Body() dto: RegisterContactRequestDto,
  ): Promise<ContactResponseDto> {
    const contact = await this.registerContact.execute({
      name: dto.name,
      email: dto.email,
    });
    return ContactResponseDto.fromDomain(contact);
  }

  @Get()
  @ApiOperation({ summary: 'List contacts ordered by email' })
  @ApiResponse({ status: 200, type: [ContactResponseDto] })
  async list(): Promise<ContactResponseDto[]> {
    const contacts = await this.listContacts.execute();
    return contacts.map((c) => ContactResponseDto.fromDomain(c));
  }

  @Get(':email')
  @ApiOperation({ summary: 'Get a contact by email' })
  @ApiParam({
    name: 'email',
    description: 'Contact email address (exact match)',
    example: 'john@example.com',
  })
  @ApiResponse({ status: 200, type: ContactResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Invalid email format',
    type: ApiErrorDto,
  })
  @ApiResponse({
    status: 404,
    description: 'Contact not found',
    type: ApiErrorDto,
  })
  async findByEmail(
    @Param('email') email: string,
  ): Promise<ContactResponseDto> {
    const address = Email.tryCreate(email);
    if (address instanceof InvalidEmailException) {
      throw new BadRequestException(address.message);
    }

    const contact = await this.getContactByEmail.execute(address);
    return ContactResponseDto.fromDomain(contact);
  }
}
