/**
 * VPN profile shape and the default structural validator.
 *
 * The coordinator treats a profile as opaque apart from `id` and `name`;
 * protocol-specific fields live in `protocolOptions` and belong to the engine.
 */

import { z } from 'zod';

export const VPN_PROTOCOLS = [
  'shadowsocks',
  'vmess',
  'vless',
  'trojan',
  'hysteria',
  'hysteria2',
  'tuic',
  'wireguard',
] as const;

export const AUTH_METHODS = ['password', 'certificate', 'token', 'none'] as const;

export type VpnProtocol = (typeof VPN_PROTOCOLS)[number];
export type AuthMethod = (typeof AUTH_METHODS)[number];

/** Credential field each auth method requires. */
const REQUIRED_CREDENTIAL: Record<AuthMethod, 'password' | 'certificate' | 'token' | null> = {
  password: 'password',
  certificate: 'certificate',
  token: 'token',
  none: null,
};

const credentialsSchema = z
  .object({
    password: z.string().optional(),
    certificate: z.string().optional(),
    token: z.string().optional(),
  })
  .passthrough();

export const vpnProfileSchema = z
  .object({
    id: z.string().min(1, 'id must not be empty'),
    name: z.string().min(1, 'name must not be empty'),
    server: z.object({
      address: z.string().min(1, 'address must not be empty'),
      port: z.number().int().min(1).max(65535),
    }),
    protocol: z.enum(VPN_PROTOCOLS),
    authMethod: z.enum(AUTH_METHODS),
    credentials: credentialsSchema.default({}),
    protocolOptions: z.record(z.unknown()).default({}),
  })
  .superRefine((profile, ctx) => {
    const field = REQUIRED_CREDENTIAL[profile.authMethod];
    if (field === null) return;
    const value = profile.credentials[field];
    if (typeof value !== 'string' || value.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['credentials', field],
        message: `${field} is required for authMethod '${profile.authMethod}'`,
      });
    }
  });

export type VpnProfile = z.infer<typeof vpnProfileSchema>;

export type ValidationResult = { ok: true } | { ok: false; errors: string[] };

/** Structural validator collaborator consulted before any engine call. */
export interface ConfigValidator {
  validate(profile: unknown): ValidationResult;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export class ProfileValidator implements ConfigValidator {
  validate(profile: unknown): ValidationResult {
    const result = vpnProfileSchema.safeParse(profile);
    if (result.success) {
      return { ok: true };
    }
    return { ok: false, errors: formatIssues(result.error) };
  }
}

/**
 * Parses a profile from JSON text (e.g. a file handed to the CLI).
 * @throws {Error} listing every validation problem
 */
export function parseProfile(json: string): VpnProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(`Profile is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = vpnProfileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Profile is invalid:\n${formatIssues(result.error).map((e) => `  - ${e}`).join('\n')}`
    );
  }
  return result.data;
}
