import { render } from '@react-email/render';
import * as React from 'react';
import { EmailVerification, type EmailVerificationProps } from './templates/email-verification.js';

export interface RenderedEmail {
  html: string;
  text: string;
}

/**
 * Renders the verification template to HTML and plain text.
 * Without a username or code the output keeps `{{username}}` and `{{code}}`.
 */
export async function renderVerificationTemplate(
  params: EmailVerificationProps = {}
): Promise<RenderedEmail> {
  const element = React.createElement(EmailVerification, params);

  const html = await render(element);
  const text = await render(element, { plainText: true });

  return { html, text };
}
