import { Body, Controller, HttpCode, HttpStatus, Logger, Param, Post } from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiParam,
  ApiOkResponse,
  ApiCreatedResponse,
  ApiResponse,
} from '@nestjs/swagger';
import { MailboxService } from './mailbox.service';
import { MailMessageEnvelopeDto, OperationResultDto } from '../shared/dto/mail-message.dto';
import { DrainInboxResponseDto } from './dto/response.dto';

@ApiTags('Mailbox')
@Controller('api/mailbox')
export class MailboxController {
  private readonly logger = new Logger(MailboxController.name);

  constructor(private readonly mailboxService: MailboxService) {}

  /**
   * POST /api/mailbox/messages
   * Store a message in its recipient's inbox
   */
  @Post('messages')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Enqueue a message' })
  @ApiCreatedResponse({ type: OperationResultDto, description: 'The message was stored.' })
  @ApiResponse({ status: 400, description: 'Message or recipient missing.' })
  enqueueMessage(@Body() dto: MailMessageEnvelopeDto): OperationResultDto {
    this.logger.debug(`POST /api/mailbox/messages`);

    return this.mailboxService.enqueue(dto.message);
  }

  /**
   * POST /api/mailbox/inboxes/:address/drain
   * Retrieve and clear every message waiting for an address
   */
  @Post('inboxes/:address/drain')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Drain an inbox',
    description: 'Returns the waiting messages in arrival order and empties the inbox. Unknown inboxes yield an empty list.',
  })
  @ApiParam({ name: 'address', description: 'The address whose inbox is drained.' })
  @ApiOkResponse({ type: DrainInboxResponseDto, description: 'The drained messages.' })
  drainInbox(@Param('address') address: string): DrainInboxResponseDto {
    this.logger.debug(`POST /api/mailbox/inboxes/.../drain`);

    return { messages: this.mailboxService.drain(address) };
  }
}
