import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  Inject,
  Logger,
  Param,
  Post,
  Query,
  Req,
  Res,
  StreamableFile,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Settings, SETTINGS } from '../config/settings';
import { parseWith } from '../common/utils/validation.util';
import { EmailTrackerService } from './services/email-tracker.service';
import {
  bounceSchema,
  complaintSchema,
  TrackingContext,
} from './types/email.types';

export const TRACKING_PIXEL = Buffer.from(
  'R0lGODlhAQABAIAAAAAAAP///yH5BAEAAAAALAAAAAABAAEAAAIBRAA7',
  'base64',
);

function isHttpUrl(value: string | undefined): value is string {
  if (!value) {
    return false;
  }
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/** Public endpoints hit by mail clients; they never answer with an error. */
@Controller('track')
export class TrackingController {
  private readonly logger = new Logger(TrackingController.name);

  constructor(
    private readonly tracker: EmailTrackerService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  @Get('open/:trackingId')
  @Header('Cache-Control', 'no-store, no-cache, must-revalidate')
  open(
    @Param('trackingId') trackingId: string,
    @Req() req: Request,
  ): StreamableFile {
    try {
      this.tracker.trackOpen(trackingId, this.context(req));
    } catch (error) {
      this.logger.warn(
        `open tracking failed: trackingId=${trackingId} ${String(error)}`,
      );
    }
    return new StreamableFile(TRACKING_PIXEL, {
      type: 'image/gif',
      length: TRACKING_PIXEL.length,
    });
  }

  @Get('click/:trackingId')
  click(
    @Param('trackingId') trackingId: string,
    @Query('url') url: string | undefined,
    @Req() req: Request,
    @Res() res: Response,
  ): void {
    const target = isHttpUrl(url) ? url : this.settings.frontendUrl;
    try {
      this.tracker.trackClick(trackingId, target, this.context(req));
    } catch (error) {
      this.logger.warn(
        `click tracking failed: trackingId=${trackingId} ${String(error)}`,
      );
    }
    res.redirect(302, target);
  }

  @Post('bounce')
  @HttpCode(200)
  bounce(@Body() body: unknown): { recorded: boolean } {
    const input = parseWith(bounceSchema, body);
    return {
      recorded: this.tracker.trackBounce(
        input.email,
        input.bounce_type,
        input.reason,
        input.edition_id,
      ),
    };
  }

  @Post('complaint')
  @HttpCode(200)
  complaint(@Body() body: unknown): { recorded: boolean } {
    const input = parseWith(complaintSchema, body);
    return {
      recorded: this.tracker.trackComplaint(
        input.email,
        input.complaint_type,
        input.edition_id,
      ),
    };
  }

  private context(req: Request): TrackingContext {
    return {
      ipAddress: req.ip ?? null,
      userAgent: req.get('user-agent') ?? null,
    };
  }
}
