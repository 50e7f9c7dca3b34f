import { describe, expect, it } from 'vitest';
import { analyzeCertificate, calculateSecurityScore, gradeFor } from './analyzer.js';
import type { CertificateFields } from '../types/certificate.js';

const NOW = new Date('2026-01-01T00:00:00.000Z');

function fields(overrides: Partial<CertificateFields> = {}): CertificateFields {
  return {
    subject: 'CN=www.example.test, O=Example Org, C=US',
    issuer: 'CN=Example CA, O=Example Trust, C=US',
    serialNumber: '0A1B2C',
    version: 3,
    notBefore: new Date('2025-10-01T00:00:00.000Z'),
    notAfter: new Date('2026-04-01T00:00:00.000Z'),
    subjectAltNames: [
      { type: 'DNS', value: 'www.example.test' },
      { type: 'DNS', value: '*.api.example.test' },
    ],
    ...overrides,
  };
}

describe('analyzeCertificate', () => {
  it('analyzes a valid certificate that matches the hostname', () => {
    const analysis = analyzeCertificate(fields(), 'www.example.test', NOW);

    expect(analysis.subject).toEqual({
      'Common Name': 'www.example.test',
      Organization: 'Example Org',
      Country: 'US',
    });
    expect(analysis.issuer['Common Name']).toBe('Example CA');
    expect(analysis.notBefore).toBe('2025-10-01T00:00:00.000Z');
    expect(analysis.notAfter).toBe('2026-04-01T00:00:00.000Z');
    expect(analysis.daysUntilExpiry).toBe(90);
    expect(analysis.isExpired).toBe(false);
    expect(analysis.expiresSoon).toBe(false);
    expect(analysis.hostnameMatch).toBe(true);
  });

  it('matches through a wildcard SAN', () => {
    expect(analyzeCertificate(fields(), 'v1.api.example.test', NOW).hostnameMatch).toBe(true);
    expect(analyzeCertificate(fields(), 'a.b.api.example.test', NOW).hostnameMatch).toBe(false);
  });

  it('flags expired certificates', () => {
    const analysis = analyzeCertificate(fields({ notAfter: new Date('2025-12-01T00:00:00.000Z') }), 'www.example.test', NOW);
    expect(analysis.daysUntilExpiry).toBe(-31);
    expect(analysis.isExpired).toBe(true);
    expect(analysis.expiresSoon).toBe(false);
  });

  it('flags certificates expiring within 30 days', () => {
    const analysis = analyzeCertificate(fields({ notAfter: new Date('2026-01-21T00:00:00.000Z') }), 'www.example.test', NOW);
    expect(analysis.daysUntilExpiry).toBe(20);
    expect(analysis.expiresSoon).toBe(true);
  });
});

describe('calculateSecurityScore', () => {
  it('gives a perfect score to a valid, matching certificate', () => {
    const score = calculateSecurityScore(analyzeCertificate(fields(), 'www.example.test', NOW));
    expect(score).toEqual({ score: 100, grade: 'A+', issues: [] });
  });

  it('deducts 50 for an expired certificate', () => {
    const analysis = analyzeCertificate(fields({ notAfter: new Date('2025-12-01T00:00:00.000Z') }), 'www.example.test', NOW);
    expect(calculateSecurityScore(analysis)).toEqual({ score: 50, grade: 'D', issues: ['Certificate expired'] });
  });

  it('deducts 10 for a certificate expiring soon', () => {
    const analysis = analyzeCertificate(fields({ notAfter: new Date('2026-01-21T00:00:00.000Z') }), 'www.example.test', NOW);
    expect(calculateSecurityScore(analysis)).toEqual({ score: 90, grade: 'A+', issues: ['Certificate expires soon'] });
  });

  it('deducts 20 for a hostname mismatch', () => {
    const analysis = analyzeCertificate(fields(), 'other.example.test', NOW);
    expect(calculateSecurityScore(analysis)).toEqual({ score: 80, grade: 'A-', issues: ['Hostname mismatch'] });
  });

  it('combines penalties', () => {
    const analysis = analyzeCertificate(fields({ notAfter: new Date('2025-12-01T00:00:00.000Z') }), 'other.example.test', NOW);
    expect(calculateSecurityScore(analysis)).toEqual({
      score: 30,
      grade: 'F',
      issues: ['Certificate expired', 'Hostname mismatch'],
    });
  });
});

describe('gradeFor', () => {
  it.each([
    [100, 'A+'],
    [90, 'A+'],
    [89, 'A'],
    [85, 'A'],
    [80, 'A-'],
    [79, 'B'],
    [60, 'C'],
    [50, 'D'],
    [49, 'F'],
    [0, 'F'],
  ])('maps %i to %s', (score, grade) => {
    expect(gradeFor(score)).toBe(grade);
  });
});
