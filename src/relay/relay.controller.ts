import { Body, Controller, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ApiBadRequestResponse, ApiInternalServerErrorResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RelayService } from './relay.service';
import { abortOnDisconnect, type DisconnectSource } from './abort-on-disconnect';
import { MailMessageEnvelopeDto, OperationResultDto } from '../shared/dto/mail-message.dto';

@ApiTags('Relay')
@Controller('api/relay')
export class RelayController {
  constructor(private readonly relayService: RelayService) {}

  /**
   * Resolve the recipient and deliver the message, retrying on failure.
   * A client that disconnects cancels the run at its next backoff.
   */
  @Post('messages')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a message', description: 'Resolves the recipient and delivers with retries.' })
  @ApiResponse({ status: 200, description: 'Delivery outcome.', type: OperationResultDto })
  @ApiBadRequestResponse({ description: 'Empty message or recipient.' })
  @ApiInternalServerErrorResponse({ description: 'Directory or mailbox unreachable.' })
  async sendMessage(
    @Body() body: MailMessageEnvelopeDto,
    @Res({ passthrough: true }) res: DisconnectSource,
  ): Promise<OperationResultDto> {
    const guard = abortOnDisconnect(res);
    try {
      return await this.relayService.sendMessage(body.message, guard.signal);
    } finally {
      guard.dispose();
    }
  }
}
