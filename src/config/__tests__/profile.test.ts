import { describe, it, expect } from 'vitest';
import { ProfileValidator, parseProfile } from '../profile.js';

const validProfile = {
  id: 'profile-1',
  name: 'Tokyo 1',
  server: { address: 'vpn.example.com', port: 443 },
  protocol: 'trojan',
  authMethod: 'password',
  credentials: { password: 'test-secret' },
};

describe('ProfileValidator', () => {
  const validator = new ProfileValidator();

  it('accepts a complete profile', () => {
    expect(validator.validate(validProfile)).toEqual({ ok: true });
  });

  it('accepts authMethod none without credentials', () => {
    const { credentials: _credentials, ...rest } = validProfile;
    expect(validator.validate({ ...rest, protocol: 'wireguard', authMethod: 'none' })).toEqual({ ok: true });
  });

  it('requires the credential the auth method needs', () => {
    expect(validator.validate({ ...validProfile, credentials: {} })).toEqual({
      ok: false,
      errors: ["credentials.password: password is required for authMethod 'password'"],
    });
    expect(validator.validate({ ...validProfile, authMethod: 'token', credentials: { token: '  ' } })).toEqual({
      ok: false,
      errors: ["credentials.token: token is required for authMethod 'token'"],
    });
  });

  it('reports every structural problem', () => {
    const result = validator.validate({ ...validProfile, id: '', server: { address: 'vpn.example.com', port: 70000 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(2);
      expect(result.errors[0]).toBe('id: id must not be empty');
      expect(result.errors[1]).toMatch(/^server\.port: /);
    }
  });

  it('rejects an unknown protocol', () => {
    const result = validator.validate({ ...validProfile, protocol: 'telnet' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]).toMatch(/^protocol: /);
    }
  });

  it('rejects a non-object', () => {
    expect(validator.validate(null)).toMatchObject({ ok: false });
  });
});

describe('parseProfile', () => {
  it('parses and fills defaults', () => {
    const profile = parseProfile(JSON.stringify(validProfile));
    expect(profile.protocolOptions).toEqual({});
    expect(profile.server.port).toBe(443);
  });

  it('keeps protocol-specific fields opaque', () => {
    const profile = parseProfile(
      JSON.stringify({ ...validProfile, protocolOptions: { sni: 'cdn.example.com', alpn: ['h2'] } })
    );
    expect(profile.protocolOptions).toEqual({ sni: 'cdn.example.com', alpn: ['h2'] });
  });

  it('throws on invalid JSON', () => {
    expect(() => parseProfile('{')).toThrow(/^Profile is not valid JSON: /);
  });

  it('throws with the list of problems', () => {
    expect(() => parseProfile(JSON.stringify({ ...validProfile, credentials: {} }))).toThrow(
      "Profile is invalid:\n  - credentials.password: password is required for authMethod 'password'"
    );
  });
});
