import { Body, Container, Head, Heading, Html, Preview, Section, Text } from '@react-email/components';
import * as React from 'react';

export const DEFAULT_FOOTER =
  'You are receiving this because a newsletter subscription was requested in game.';

export interface BaseLayoutProps {
  preview: string;
  heading: string;
  /** Replaces the default footer line */
  footer?: string;
  children: React.ReactNode;
}

/**
 * Card layout shared by subscription emails: heading banner, content, footer
 */
export function BaseLayout({ preview, heading, footer = DEFAULT_FOOTER, children }: BaseLayoutProps) {
  return (
    <Html lang="en">
      <Head />
      <Preview>{preview}</Preview>
      <Body style={page}>
        <Container style={card}>
          <Section style={banner}>
            <Heading as="h1" style={bannerTitle}>
              {heading}
            </Heading>
          </Section>
          <Section style={content}>{children}</Section>
          <Text style={footerText}>{footer}</Text>
        </Container>
      </Body>
    </Html>
  );
}

const page = {
  backgroundColor: '#1c1917',
  padding: '32px 0',
  fontFamily: 'Verdana, Geneva, Tahoma, sans-serif',
} as const;

const card = {
  maxWidth: '520px',
  margin: '0 auto',
  backgroundColor: '#fafaf9',
  border: '2px solid #44403c',
} as const;

const banner = {
  backgroundColor: '#15803d',
  padding: '20px 24px',
} as const;

const bannerTitle = {
  margin: 0,
  fontSize: '22px',
  color: '#ffffff',
} as const;

const content = {
  padding: '24px',
} as const;

const footerText = {
  margin: 0,
  padding: '12px 24px 20px',
  fontSize: '11px',
  color: '#78716c',
  borderTop: '1px solid #e7e5e4',
} as const;
