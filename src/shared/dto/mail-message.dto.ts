import { Type } from 'class-transformer';
import { IsDefined, IsInt, IsString, Min, ValidateNested } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import type { MailMessage, OperationResult } from '../interfaces/mail-message.interface';

export class MailMessageDto implements MailMessage {
  @ApiProperty({ description: 'Address of the sender.', example: 'alice@earth.com' })
  @IsString()
  sender!: string;

  @ApiProperty({ description: 'Address of the recipient.', example: 'bob@saturn.com' })
  @IsString()
  recipient!: string;

  @ApiProperty({ description: 'Subject line.', example: 'Hello from Earth!' })
  @IsString()
  subject!: string;

  @ApiProperty({ description: 'Message body.', example: 'Hi Bob, this is a test email from Alice.' })
  @IsString()
  body!: string;

  @ApiProperty({ description: 'Unix timestamp (seconds) set by the sender.', example: 1735689600 })
  @IsInt()
  @Min(0)
  timestamp!: number;
}

/**
 * Request envelope used by the enqueue and send endpoints.
 */
export class MailMessageEnvelopeDto {
  @ApiProperty({ type: MailMessageDto })
  @IsDefined({ message: 'mail message cannot be empty' })
  @ValidateNested()
  @Type(() => MailMessageDto)
  message!: MailMessageDto;
}

export class OperationResultDto implements OperationResult {
  @ApiProperty({ description: 'Whether the operation took effect.', example: true })
  success!: boolean;

  @ApiProperty({ description: 'Human-readable outcome.', example: 'Mail sent successfully' })
  message!: string;
}
