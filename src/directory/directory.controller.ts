import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, Post } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiParam, ApiOkResponse, ApiResponse } from '@nestjs/swagger';
import { DirectoryService } from './directory.service';
import { RegisterLocationDto } from './dto/register-location.dto';
import { LookupLocationResponseDto } from './dto/response.dto';
import { OperationResultDto } from '../shared/dto/mail-message.dto';

@ApiTags('Directory')
@Controller('api/directory')
export class DirectoryController {
  private readonly logger = new Logger(DirectoryController.name);

  constructor(private readonly directoryService: DirectoryService) {}

  /**
   * POST /api/directory/entries
   * Register the mailbox location of an address
   */
  @Post('entries')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Register a mailbox location',
    description: 'Maps an address to a mailbox location. Addresses in unmanaged domains are rejected with success=false.',
  })
  @ApiOkResponse({ type: OperationResultDto, description: 'Registration outcome.' })
  @ApiResponse({ status: 400, description: 'Address or location missing, or address malformed.' })
  registerLocation(@Body() dto: RegisterLocationDto): OperationResultDto {
    this.logger.debug(`POST /api/directory/entries`);

    const { accepted, reason } = this.directoryService.register(dto.address, dto.location);
    return { success: accepted, message: reason };
  }

  /**
   * GET /api/directory/entries/:address
   * Resolve an address to its mailbox location
   */
  @Get('entries/:address')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Look up a mailbox location' })
  @ApiParam({ name: 'address', description: 'The address to resolve.' })
  @ApiOkResponse({ type: LookupLocationResponseDto, description: 'Lookup outcome.' })
  lookupLocation(@Param('address') address: string): LookupLocationResponseDto {
    this.logger.debug(`GET /api/directory/entries/...`);

    return this.directoryService.lookup(address);
  }
}
