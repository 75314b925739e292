import { ApiProperty } from '@nestjs/swagger';

export class LookupLocationResponseDto {
  @ApiProperty({ description: 'Whether the address has a registered location.', example: true })
  found!: boolean;

  @ApiProperty({ description: 'Registered location, empty when not found.', example: 'http://mail-earth:3000' })
  location!: string;
}
