import { describe, it, expect } from 'vitest';
import { isOriginAllowed } from '../websocket-gateway.service';

describe('isOriginAllowed', () => {
  const allowed = ['http://localhost:5173', 'https://*.analytics.test'];

  it('should allow clients that send no origin', () => {
    expect(isOriginAllowed(undefined, allowed)).toBe(true);
  });

  it('should match exact origins', () => {
    expect(isOriginAllowed('http://localhost:5173', allowed)).toBe(true);
    expect(isOriginAllowed('http://localhost:3000', allowed)).toBe(false);
  });

  it('should expand wildcards without treating dots as patterns', () => {
    expect(isOriginAllowed('https://app.analytics.test', allowed)).toBe(true);
    expect(isOriginAllowed('https://appXanalytics.test', allowed)).toBe(false);
    expect(isOriginAllowed('http://app.analytics.test', allowed)).toBe(false);
  });

  it('should reject everything when no origins are configured', () => {
    expect(isOriginAllowed('http://localhost:5173', [])).toBe(false);
  });
});
