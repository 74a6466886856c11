import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { z } from 'zod';
import { parseWith } from '../common/utils/validation.util';
import { SubscribersService } from './services/subscribers.service';
import { renderSuccessPage } from './templates/pages.template';
import { sendHtmlPage } from './utils/html-page.util';

const resendSchema = z.object({ email: z.string().email() });

@Controller('verify')
export class VerifyController {
  constructor(private readonly subscribersService: SubscribersService) {}

  @Get()
  verify(@Query('token') token: string = '', @Res() res: Response): void {
    sendHtmlPage(res, () => {
      const outcome = this.subscribersService.verify(token);
      return outcome.alreadyVerified
        ? renderSuccessPage(
            'Email already verified',
            "Your email address has already been verified. You're all set!",
          )
        : renderSuccessPage(
            'Email Verified!',
            `Thank you for verifying your email address (${outcome.email}). ` +
              "You'll now receive our newsletters!",
          );
    });
  }

  /** Accepts `?email=` or a JSON body. */
  @Post('resend')
  @HttpCode(200)
  async resend(
    @Query('email') emailQuery: string | undefined,
    @Body() body: unknown,
  ): Promise<{ message: string }> {
    const { email } = parseWith(
      resendSchema,
      emailQuery ? { email: emailQuery } : body ?? {},
    );
    return { message: await this.subscribersService.resendVerification(email) };
  }
}
