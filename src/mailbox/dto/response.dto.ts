import { ApiProperty } from '@nestjs/swagger';
import { MailMessageDto } from '../../shared/dto/mail-message.dto';
import type { MailMessage } from '../../shared/interfaces/mail-message.interface';

export class DrainInboxResponseDto {
  @ApiProperty({ type: [MailMessageDto], description: 'Messages in arrival order; the inbox is empty afterwards.' })
  messages!: Readonly<MailMessage>[];
}
