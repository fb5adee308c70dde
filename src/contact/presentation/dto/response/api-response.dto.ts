import { ApiProperty } from '@nestjs/swagger';

export class ErrorDetailDto {
  @ApiProperty({ example: 'email' })
  field!: string;

  @ApiProperty({
    example: { isEmailValue: 'email must be a structurally valid email address' },
  })
  constraints!: Record<string, string>;
}

export class ErrorBodyDto {
  @ApiProperty({ example: 400 })
  statusCode!: number;

  @ApiProperty({ example: 'Validation failed' })
  message!: string;

  @ApiProperty({ type: [ErrorDetailDto], example: [] })
  details!: ErrorDetailDto[];
}

export class ApiErrorDto {
  @ApiProperty({ example: false })
  success!: boolean;

  @ApiProperty({ type: ErrorBodyDto })
  error!: ErrorBodyDto;

  @ApiProperty({ example: '2026-02-22T10:00:00.000Z' })
  timestamp!: string;
}
