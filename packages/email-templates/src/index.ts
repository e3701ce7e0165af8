// Templates
export {
  EmailVerification,
  CODE_PLACEHOLDER,
  USERNAME_PLACEHOLDER,
} from './templates/email-verification.js';
export type { EmailVerificationProps } from './templates/email-verification.js';
export { BaseLayout, DEFAULT_FOOTER } from './templates/base-layout.js';
export type { BaseLayoutProps } from './templates/base-layout.js';

// Render utilities
export { renderVerificationTemplate } from './render.js';
export type { RenderedEmail } from './render.js';
export {
  loadVerificationTemplate,
  VERIFICATION_HTML_FILE,
  VERIFICATION_TEXT_FILE,
} from './template-store.js';
export type { LoadVerificationTemplateOptions } from './template-store.js';
