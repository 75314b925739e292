import { IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class RegisterLocationDto {
  @ApiProperty({
    description: 'Full address to register. Its domain must be managed by this directory.',
    example: 'alice@earth.com',
  })
  @IsString()
  address!: string;

  @ApiProperty({
    description: 'Location where the mailbox for this address can be reached.',
    example: 'http://mail-earth:3000',
  })
  @IsString()
  location!: string;
}
