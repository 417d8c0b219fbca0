/**
 * Bot replies shown to chat users
 */
export const BOT_REPLIES = {
  passwordPrompt: '🔑 Enter the password to receive notifications:',
  accessGranted: '🔐 Access granted',
  accessDenied: '❌ Access denied',
  invalidPassword: '❌ Invalid password',
} as const;
