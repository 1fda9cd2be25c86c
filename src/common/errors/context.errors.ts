export const ContextErrors = {
  SESSION_NOT_FOUND: {
    code: 'CONTEXT_SESSION_NOT_FOUND',
    message: 'Cart session id is missing. Send it in the x-session-id header.',
  },
} as const;
