// apps/api/src/fieldsync/core/sync/sync.controller.ts

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  PayloadTooLargeException,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiHeader,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';

import {
  AuthGuard,
  AuthenticatedRequest,
  authenticatedUserId,
} from '../../security/auth/auth.guard';
import { FN_SYNC_HANDSHAKE } from '../functional-ids';
import { LogCategory, LogLevel, LogService } from '../logging/log.service';
import { PullQueryDto } from './dto/pull-query.dto';
import { PushRequestDto } from './dto/push-request.dto';
import { PullProcessorService } from './pull/pull-processor.service';
import { PushProcessorService } from './push/push-processor.service';
import { SYNC_SETTINGS, SyncSettings } from './sync-settings';
import type {
  HandshakeResponse,
  PullResponse,
  PushResponse,
} from './sync.types';

const MAX_IDEMPOTENCY_KEY_LENGTH = 255;

@ApiTags('sync')
@ApiBearerAuth()
@UseGuards(AuthGuard)
@Controller('sync')
export class SyncController {
  constructor(
    private readonly pushProcessor: PushProcessorService,
    private readonly pullProcessor: PullProcessorService,
    private readonly logService: LogService,
    @Inject(SYNC_SETTINGS) private readonly settings: SyncSettings,
  ) {}

  @Get('handshake')
  @ApiOperation({ summary: 'Server time, protocol limits and conflict policy' })
  @ApiOkResponse({ description: 'Handshake parameters' })
  handshake(@Req() request: AuthenticatedRequest): HandshakeResponse {
    this.logService.logEvent({
      category: LogCategory.SYNC,
      level: LogLevel.DEBUG,
      message: 'Handshake',
      functionId: FN_SYNC_HANDSHAKE,
      actorUserId: authenticatedUserId(request),
    });

    return {
      server_time: new Date().toISOString(),
      min_client_version: this.settings.minClientVersion,
      conflict_policy_default: this.settings.conflictPolicyDefault,
      max_ops_per_push: this.settings.maxOpsPerPush,
      max_pull_limit: this.settings.maxPullLimit,
      change_log_retention_days: this.settings.changeLogRetentionDays,
    };
  }

  @Post('push')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Apply a batch of queued client operations' })
  @ApiHeader({
    name: 'X-Idempotency-Key',
    required: true,
    description: 'Unique per batch; resubmissions replay the stored response.',
  })
  @ApiOkResponse({ description: 'Acked ops, rejected ops, id map and server cursor' })
  push(
    @Req() request: AuthenticatedRequest,
    @Headers('x-idempotency-key') idempotencyKey: string | undefined,
    @Body() body: PushRequestDto,
  ): Promise<PushResponse> {
    const key = idempotencyKey?.trim();

    if (!key) {
      throw new BadRequestException({
        code: 'missing_header',
        message: 'X-Idempotency-Key header is required',
      });
    }

    if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new BadRequestException({
        code: 'invalid_header',
        message: `X-Idempotency-Key must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
      });
    }

    if (body.ops.length > this.settings.maxOpsPerPush) {
      throw new PayloadTooLargeException({
        code: 'payload_too_large',
        message: `A push may contain at most ${this.settings.maxOpsPerPush} operations`,
      });
    }

    return this.pushProcessor.processPush(
      authenticatedUserId(request),
      body.device_id,
      body.ops,
      key,
    );
  }

  @Get('pull')
  @ApiOperation({ summary: 'Read the change stream after a cursor' })
  @ApiOkResponse({ description: 'Changes, next cursor and has_more flag' })
  pull(
    @Req() request: AuthenticatedRequest,
    @Query() query: PullQueryDto,
  ): Promise<PullResponse> {
    return this.pullProcessor.processPull(
      authenticatedUserId(request),
      query.since,
      query.limit,
    );
  }
}
