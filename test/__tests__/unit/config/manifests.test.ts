import { describe, it, expect } from '@jest/globals';
import { resolveManifests, supportedLanguages } from '../../../../src/config/manifests';
import { ConfigurationError, ErrorCodes } from '../../../../src/lib/errors';

describe('resolveManifests', () => {
  it('should keep pip before poetry for Python', () => {
    expect(resolveManifests('python').slice(0, 2)).toEqual([
      { fileName: 'requirements.txt', system: 'pip' },
      { fileName: 'pyproject.toml', system: 'poetry or other build systems' },
    ]);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(resolveManifests(' Go ')).toEqual([{ fileName: 'go.mod', system: 'go modules' }]);
  });

  it('should reject unsupported languages', () => {
    expect(() => resolveManifests('cobol')).toThrow(ConfigurationError);
    expect(() => resolveManifests('constructor')).toThrow(
      expect.objectContaining({ code: ErrorCodes.UNSUPPORTED_LANGUAGE }),
    );
  });
});

describe('supportedLanguages', () => {
  it('should list languages alphabetically', () => {
    const languages = supportedLanguages();

    expect(languages[0]).toBe('dart');
    expect(languages).toContain('python');
    expect([...languages].sort()).toEqual(languages);
  });
});
