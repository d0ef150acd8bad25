import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsNotEmpty,
  IsString,
  MaxLength,
} from 'class-validator';

import { SYNC_ACTIONS, SYNC_ENTITY_TYPES } from '../sync.types';

/**
 * Documentation shape of one queued mutation. Ops are validated one by one
 * by the push processor so that a malformed op rejects only itself.
 */
export class SyncOperationDto {
  @ApiProperty({ description: 'Client-unique operation id, echoed in acks and rejections.' })
  op_id!: string;

  @ApiProperty({ enum: SYNC_ENTITY_TYPES })
  entity_type!: string;

  @ApiProperty({ enum: SYNC_ACTIONS })
  action!: string;

  @ApiPropertyOptional({
    description: 'Device-generated UUID; makes create idempotent.',
    format: 'uuid',
  })
  client_id?: string | null;

  @ApiPropertyOptional({ description: 'Server id, when already known.' })
  server_id?: number | null;

  @ApiProperty({
    description: 'Revision the client last saw; 0 for creates.',
    default: 0,
  })
  base_revision!: number;

  @ApiProperty({
    description: 'Domain fields. Parents may be referenced by <parent>_id or <parent>_client_id.',
    type: 'object',
    additionalProperties: true,
  })
  payload!: Record<string, unknown>;
}

export class PushRequestDto {
  @ApiProperty({ description: 'Stable identifier of the pushing device.', example: 'ipad-7f3c' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  device_id!: string;

  @ApiProperty({ type: [SyncOperationDto] })
  @IsArray()
  ops!: unknown[];
}
