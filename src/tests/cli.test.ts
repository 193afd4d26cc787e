// src/tests/cli.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { collectValues, parseLabelOptions, parseLabelPairs } from '../cli/cli-utils';
import { buildConverterConfig, runConvert } from '../cli/convert';
import { renderScript } from '../cli/script';
import { ConfigurationError, InvalidLabelMapError } from '../errors/TranscriptErrors';

const fixtures = path.join(__dirname, 'fixtures');

describe('CLI helpers', () => {
  it('should collect repeated option values', () => {
    expect(collectValues('b', ['a'])).toEqual(['a', 'b']);
    expect(collectValues('a')).toEqual(['a']);
  });

  describe('parseLabelOptions', () => {
    it('should split at the first equals sign', () => {
      expect(parseLabelOptions(['RGB(74,21,148)=Expert', ' #0B5DA2 =AI=bot'])).toEqual({
        'RGB(74,21,148)': 'Expert',
        '#0B5DA2': 'AI=bot'
      });
    });

    it('should reject values without a color', () => {
      expect(() => parseLabelOptions(['Expert']))
        .toThrow("Invalid label map entry 'Expert': expected <color>=<label>");
      expect(() => parseLabelOptions(['=Expert'])).toThrow(InvalidLabelMapError);
    });
  });

  describe('parseLabelPairs', () => {
    it('should pair colors with names', () => {
      expect(parseLabelPairs(['RGB(20,154,200)', 'Fred', '#B3a8C4', 'Susie'])).toEqual({
        'RGB(20,154,200)': 'Fred',
        '#B3a8C4': 'Susie'
      });
      expect(parseLabelPairs([])).toEqual({});
    });

    it('should reject an odd number of arguments', () => {
      expect(() => parseLabelPairs(['RGB(20,154,200)'])).toThrow(ConfigurationError);
    });
  });
});

describe('convert command', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'convert-cli-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should build a configuration from options alone', () => {
    const config = buildConverterConfig({
      directory: tempDir,
      label: ['#0B5DA2=AI'],
      policy: 'abort',
      sort: true
    });

    expect(config).toEqual({
      inputDir: tempDir,
      extension: '.rtf',
      labelMap: { '#0B5DA2': 'AI' },
      errorPolicy: 'abort',
      sortFiles: true,
      forceOverwrite: false
    });
  });

  it('should let options override the configuration file', () => {
    const configPath = path.join(tempDir, 'converter.json');
    fs.writeFileSync(configPath, JSON.stringify({
      inputDir: 'rtf',
      labelMap: { '#0B5DA2': 'Bot', 'RGB(74,21,148)': 'Expert' }
    }));

    const config = buildConverterConfig({ config: configPath, label: ['#0B5DA2=AI'], force: true });

    expect(config.inputDir).toBe(path.join(tempDir, 'rtf'));
    expect(config.labelMap).toEqual({ '#0B5DA2': 'AI', 'RGB(74,21,148)': 'Expert' });
    expect(config.forceOverwrite).toBe(true);
  });

  it('should reject an unknown policy', () => {
    expect(() => buildConverterConfig({ label: [], policy: 'retry' }))
      .toThrow(/^Invalid converter options: errorPolicy: /);
  });

  it('should validate the label map before reading any document', () => {
    const inputDir = path.join(tempDir, 'rtf');
    fs.mkdirSync(inputDir);
    fs.copyFileSync(path.join(fixtures, 'meganDenial.rtf'), path.join(inputDir, 'meganDenial.rtf'));
    const outputFile = path.join(tempDir, 'discussion.json');

    const config = buildConverterConfig({ directory: inputDir, output: outputFile, label: ['RGB(300,0,0)=Expert'] });
    expect(() => runConvert(config)).toThrow(InvalidLabelMapError);
    expect(fs.existsSync(outputFile)).toBe(false);
  });

  it('should convert a directory', () => {
    const inputDir = path.join(tempDir, 'rtf');
    fs.mkdirSync(inputDir);
    fs.copyFileSync(path.join(fixtures, 'tamaraDenial.rtf'), path.join(inputDir, 'tamaraDenial.rtf'));

    const result = runConvert(buildConverterConfig({
      directory: inputDir,
      label: ['RGB(74,21,148)=Expert', 'RGB(11,93,162)=AI']
    }));

    expect(result.discussion).toHaveLength(1);
    expect(result.discussion[0].turns.map(turn => turn.label)).toEqual(['Expert', 'AI', 'Expert']);
  });
});

describe('script command', () => {
  const tamara = path.join(fixtures, 'tamaraDenial.rtf');

  it('should print a labeled script', () => {
    const output = renderScript(['RGB(74,21,148)', 'Expert', '#0B5DA2', 'AI', tamara], { label: [], format: 'script' });

    expect(output).toBe(
      'Expert: I wonder why the kettle whistles.\n' +
      'AI: Steam escapes through a narrow opening. It\u2019s loud.\n' +
      'Expert: Caf\u00e9 talk aside, thanks.\n'
    );
  });

  it('should print JSON Lines with labels from options', () => {
    const output = renderScript([tamara], {
      label: ['RGB(74,21,148)=Expert', 'RGB(11,93,162)=AI'],
      format: 'jsonl'
    });

    expect(output.split('\n')[0]).toBe('{"Expert":"\\n\\nI wonder why the kettle whistles.\\n"}');
  });

  it('should print unlabeled turns when no colors are named', () => {
    const output = renderScript([tamara], { label: [], format: 'script' });
    expect(output.split('\n')[0]).toBe('I wonder why the kettle whistles.');
  });

  it('should reject an unknown format', () => {
    expect(() => renderScript([tamara], { label: [], format: 'xml' }))
      .toThrow("Unknown format 'xml'; use script or jsonl");
  });

  it('should reject a missing file', () => {
    const missing = path.join(fixtures, 'nobodyHere.rtf');
    expect(() => renderScript([missing], { label: [], format: 'script' }))
      .toThrow(`File '${missing}' does not exist`);
  });

  it('should reject an incomplete color-name pair', () => {
    expect(() => renderScript(['#0B5DA2', tamara], { label: [], format: 'script' }))
      .toThrow(ConfigurationError);
  });
});
