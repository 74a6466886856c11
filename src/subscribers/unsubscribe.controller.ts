import {
  Controller,
  Get,
  HttpCode,
  Inject,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { Settings, SETTINGS } from '../config/settings';
import { SubscribersService } from './services/subscribers.service';
import { sendHtmlPage } from './utils/html-page.util';
import {
  renderSuccessPage,
  renderUnsubscribeConfirmPage,
  resubscribeLink,
} from './templates/pages.template';

@Controller('unsubscribe')
export class UnsubscribeController {
  constructor(
    private readonly subscribersService: SubscribersService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  @Get()
  page(@Query('token') token: string = '', @Res() res: Response): void {
    sendHtmlPage(res, () => {
      const { subscriber, newsletter, subscription } =
        this.subscribersService.resolveUnsubscribeToken(token);
      if (subscription.unsubscribedAt) {
        return renderSuccessPage(
          'Already unsubscribed',
          'You are already unsubscribed from this newsletter.',
          resubscribeLink(this.link('resubscribe', token)),
        );
      }
      return renderUnsubscribeConfirmPage({
        subscriberName: subscriber.name,
        newsletterName: newsletter.name,
        confirmUrl: this.link('confirm', token),
        frontendUrl: this.settings.frontendUrl,
      });
    });
  }

  @Post('confirm')
  confirm(@Query('token') token: string = '', @Res() res: Response): void {
    sendHtmlPage(res, () => {
      const changed = this.subscribersService.unsubscribeByToken(token, 'link');
      return renderSuccessPage(
        changed ? 'Unsubscribed' : 'Already unsubscribed',
        changed
          ? 'You have been successfully unsubscribed.'
          : 'You were already unsubscribed.',
        resubscribeLink(this.link('resubscribe', token)),
      );
    });
  }

  /** List-Unsubscribe-Post target; repeating it is harmless. */
  @Post('one-click')
  @HttpCode(200)
  oneClick(@Query('token') token: string = ''): {
    status: 'unsubscribed';
    message: string;
  } {
    this.subscribersService.unsubscribeByToken(token, 'one-click');
    return { status: 'unsubscribed', message: 'Successfully unsubscribed' };
  }

  @Get('resubscribe')
  resubscribe(@Query('token') token: string = '', @Res() res: Response): void {
    sendHtmlPage(res, () =>
      this.subscribersService.resubscribeByToken(token)
        ? renderSuccessPage('Welcome back', 'You have been resubscribed.')
        : renderSuccessPage('Still subscribed', 'You are already subscribed.'),
    );
  }

  private link(action: 'confirm' | 'resubscribe', token: string): string {
    const base = this.settings.unsubscribeBaseUrl;
    return `${base}/${action}?token=${encodeURIComponent(token)}`;
  }
}
