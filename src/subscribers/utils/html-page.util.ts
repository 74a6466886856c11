import { HttpException } from '@nestjs/common';
import { Response } from 'express';
import { renderErrorPage } from '../templates/pages.template';

/**
 * Sends the rendered page, or a friendly error page carrying the exception's
 * status instead of a JSON error body.
 */
export function sendHtmlPage(res: Response, render: () => string): void {
  let status = 200;
  let html: string;
  try {
    html = render();
  } catch (error) {
    if (!(error instanceof HttpException)) {
      throw error;
    }
    status = error.getStatus();
    html = renderErrorPage(error.message);
  }
  res.status(status).type('html').send(html);
}
