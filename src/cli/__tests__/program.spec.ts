/**
 * Command-line Definition Tests
 */
import { createProgram } from '../program';
import { CliOptions, loadConfig } from '../../config/app.config';

describe('createProgram', () => {
  function parseArgs(args: string[]): CliOptions {
    const program = createProgram().exitOverride();
    program.parse(['node', 'model-blocks', ...args]);
    return program.opts<CliOptions>();
  }

  it('should map flags onto CLI options', () => {
    const options = parseArgs([
      '-f', 'models.json',
      '-o', './out',
      '--skip-free',
      '--summary',
      '--force-regenerate',
      '--bump', 'patch',
      '--autocomplete', 'acme/a,acme/b',
      '--apply-threshold', '4096',
    ]);

    expect(options).toEqual({
      inputFile: 'models.json',
      outputDir: './out',
      skipFree: true,
      summary: true,
      forceRegenerate: true,
      bump: 'patch',
      autocomplete: 'acme/a,acme/b',
      applyThreshold: '4096',
    });
  });

  it('should feed loadConfig', () => {
    const config = loadConfig(parseArgs(['--api-key', 'test-key', '--apply-threshold', '100']), {});

    expect(config.apiKey).toBe('test-key');
    expect(config.applyContextThreshold).toBe(100);
  });

  it('should reject an unknown bump level', () => {
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    expect(() => program.parse(['node', 'model-blocks', '--bump', 'huge'])).toThrow();
  });
});
