import { z } from 'zod';

/** A dynamically registered OAuth client, cached per agent identity */
export const ClientRegistrationSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  /** Epoch ms; absent when the secret never expires */
  clientSecretExpiresAt: z.number().optional(),
  redirectUri: z.string().url(),
  issuer: z.string(),
  agentName: z.string(),
  /** Epoch ms */
  registeredAt: z.number(),
});

export type ClientRegistration = z.infer<typeof ClientRegistrationSchema>;

/** The token set persisted in tokens.json */
export const TokenSetSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  tokenType: z.string().min(1),
  /** Epoch ms */
  expiresAt: z.number(),
  scope: z.string().optional(),
  agentName: z.string(),
});

export type TokenSet = z.infer<typeof TokenSetSchema>;
