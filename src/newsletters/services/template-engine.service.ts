import { Inject, Injectable } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import { TemplateName } from '../../database/schema';
import { renderDefaultHtml } from '../templates/default.template';
import { renderResponsiveHtml } from '../templates/responsive.template';
import { renderText } from '../templates/text.template';
import { RenderedEdition, TemplateContext } from '../types/newsletter.types';

@Injectable()
export class TemplateEngineService {
  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  render(template: TemplateName, ctx: TemplateContext): RenderedEdition {
    const html =
      template === 'responsive'
        ? renderResponsiveHtml(ctx, this.settings.appName)
        : renderDefaultHtml(ctx, this.settings.appName);
    return { html, text: renderText(ctx, this.settings.appName) };
  }
}
