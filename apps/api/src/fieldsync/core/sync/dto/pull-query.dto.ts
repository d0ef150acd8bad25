import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString } from 'class-validator';

export class PullQueryDto {
  @ApiPropertyOptional({
    description: 'Cursor from a previous pull or push; omitted or invalid means from the beginning.',
    example: 'chg_000000000042',
  })
  @IsOptional()
  @IsString()
  since?: string;

  @ApiPropertyOptional({
    description: 'Page size; clamped to [1, SYNC_MAX_PULL_LIMIT].',
    default: 200,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  limit?: number;
}
