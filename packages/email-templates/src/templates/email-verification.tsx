import { Text } from '@react-email/components';
import { BaseLayout } from './base-layout.js';

export const CODE_PLACEHOLDER = '{{code}}';
export const USERNAME_PLACEHOLDER = '{{username}}';

export interface EmailVerificationProps {
  username?: string;
  code?: string;
  expiresInMinutes?: number;
}

/**
 * Verification code email. Rendered with the default props it keeps the
 * literal placeholders so the text can be stored and substituted later.
 */
export function EmailVerification({
  username = USERNAME_PLACEHOLDER,
  code = CODE_PLACEHOLDER,
  expiresInMinutes = 60,
}: EmailVerificationProps) {
  return (
    <BaseLayout preview="Confirm your newsletter subscription" heading="Confirm your subscription">
      <Text style={body}>Hi {username},</Text>

      <Text style={body}>
        Enter this code in game to confirm your newsletter subscription:
      </Text>

      <Text style={codeBox}>{code}</Text>

      <Text style={hint}>In chat, type: /newsletter -c {code}</Text>

      <Text style={meta}>
        The code expires in {expiresInMinutes} minute{expiresInMinutes !== 1 ? 's' : ''}.
      </Text>

      <Text style={footnote}>
        If you did not request this, you can ignore this message.
      </Text>
    </BaseLayout>
  );
}

export default EmailVerification;

// Styles

const body = {
  margin: '0 0 16px',
  fontSize: '16px',
  lineHeight: 1.6,
  color: '#3f3f46',
} as const;

const codeBox = {
  margin: '8px 0 24px',
  padding: '16px 0',
  fontSize: '32px',
  fontWeight: 700,
  letterSpacing: '0.3em',
  textAlign: 'center' as const,
  backgroundColor: '#f4f4f5',
  borderRadius: '8px',
  color: '#18181b',
} as const;

const hint = {
  margin: '0 0 10px',
  fontSize: '13px',
  color: '#52525b',
} as const;

const meta = {
  margin: '24px 0 0',
  fontSize: '12px',
  color: '#71717a',
} as const;

const footnote = {
  margin: '12px 0 0',
  fontSize: '12px',
  color: '#71717a',
} as const;
