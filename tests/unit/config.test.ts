/**
 * Configuration Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ConfigurationError,
  loadAppConfig,
  parseRecipients,
  parseSourceSecret,
  parseTargetSecret,
  sourceSecretName,
  targetSecretName,
} from '../../src/config/index.js';

const sourceSecret = {
  base_url: 'https://cp.example.com/api/query',
  system: 'TEST',
  cp_company: 1,
  username: 'svc-user',
  password: 'test-secret',
};

describe('parseSourceSecret', () => {
  it('maps the secret and defaults the NOTES filter', () => {
    expect(parseSourceSecret(sourceSecret)).toEqual({
      baseUrl: 'https://cp.example.com/api/query',
      system: 'TEST',
      company: '1',
      username: 'svc-user',
      password: 'test-secret',
      filterNotesValue: 'CT',
    });
  });

  it('accepts a custom NOTES filter', () => {
    expect(parseSourceSecret({ ...sourceSecret, filter_notes_value: 'NEW' }).filterNotesValue).toBe('NEW');
  });

  it('names every missing field', () => {
    expect(() => parseSourceSecret({ base_url: 'https://cp.example.com', password: '' })).toThrow(
      'Invalid source system secret: system: system is required; cp_company: cp_company is required; ' +
        'username: username is required; password: password is required'
    );
  });

  it('throws ConfigurationError', () => {
    expect(() => parseSourceSecret({})).toThrow(ConfigurationError);
  });
});

describe('parseTargetSecret', () => {
  it('defaults the users endpoint', () => {
    expect(parseTargetSecret({ key: 'test-key' })).toEqual({
      apiKey: 'test-key',
      usersBaseUrl: 'https://api.connecteam.com/users/v1/users',
    });
  });

  it('requires the API key', () => {
    expect(() => parseTargetSecret({})).toThrow('Invalid target system secret: key: key is required');
  });
});

describe('secret names', () => {
  it('scopes both secrets by client', () => {
    expect(sourceSecretName('acme')).toBe('costpoint/acme');
    expect(targetSecretName('acme')).toBe('connectteam/acme');
  });
});

describe('parseRecipients', () => {
  it('splits and trims, dropping blanks', () => {
    expect(parseRecipients(' a@example.com, ,b@example.com,')).toEqual(['a@example.com', 'b@example.com']);
    expect(parseRecipients('')).toEqual([]);
  });
});

describe('loadAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      region: 'us-east-1',
      sesRegion: 'us-east-1',
      snapshotBucket: null,
      snapshotPrefix: 'new-employees',
      eventsQueueUrl: null,
      fromEmail: 'noreply@example.com',
      recipients: [],
      functionName: 'new-employee-sync',
      pacing: { groupDelayMs: 500, memberDelayMs: 300, creationDelayMs: 300 },
      httpTimeoutMs: 30000,
      retryBackoffMs: 1000,
    });
  });

  it('reads overrides and treats empty strings as unset', () => {
    const config = loadAppConfig({
      AWS_REGION: 'us-gov-west-1',
      SES_REGION: 'us-east-2',
      SNAPSHOT_BUCKET: 'audit-bucket',
      EVENTS_QUEUE_URL: '',
      SES_TO_EMAILS: 'ops@example.com',
      GROUP_PACING_MS: '0',
    });

    expect(config.region).toBe('us-gov-west-1');
    expect(config.sesRegion).toBe('us-east-2');
    expect(config.snapshotBucket).toBe('audit-bucket');
    expect(config.eventsQueueUrl).toBeNull();
    expect(config.recipients).toEqual(['ops@example.com']);
    expect(config.pacing.groupDelayMs).toBe(0);
  });

  it('rejects a non-numeric delay', () => {
    expect(() => loadAppConfig({ MEMBER_PACING_MS: 'slow' })).toThrow(ConfigurationError);
  });
});
