// tests/integration/cli.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { levelForVerbosity, runCli } from '../../src/cli/run';

const BASE = 'https://ads.example.com';
const NOW = 1_700_000_000_000;

describe('CLI', () => {
  let dir: string;
  let settingsPath: string;
  let printed: string[];
  const print = (text: string) => {
    printed.push(text);
  };

  async function writeSettings(settings: Record<string, unknown>): Promise<void> {
    await fs.writeFile(settingsPath, JSON.stringify(settings));
  }

  beforeEach(async () => {
    nock.cleanAll();
    nock.disableNetConnect();
    delete process.env.AD_LIBRARY_BASE_URL;
    printed = [];
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ad-cli-'));
    settingsPath = path.join(dir, 'settings.json');
    await writeSettings({
      base_url: `${BASE}/search`,
      default_query: 'shoes',
      default_region: 'GB',
      default_pages: 1,
      default_output_format: 'json',
      output_dir: path.join(dir, 'data'),
      sleep_between_requests: 0,
      timeout: 2,
    });
  });

  afterEach(async () => {
    nock.cleanAll();
    nock.enableNetConnect();
    delete process.env.AD_LIBRARY_BASE_URL;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should scrape with settings defaults and write a timestamped file', async () => {
    nock(BASE)
      .get('/search')
      .query({ search_term: 'shoes', page: '1', region: 'GB' })
      .reply(200, { ads: [{ ad_id: '1', title: 'Sale' }] });

    const code = await runCli(['--settings', settingsPath], { now: () => NOW, print });

    expect(code).toBe(0);
    const written = JSON.parse(
      await fs.readFile(path.join(dir, 'data', 'ads_1700000000.json'), 'utf-8')
    );
    expect(written).toEqual([expect.objectContaining({ adId: '1', adTitle: 'Sale' })]);
  });

  it('should let flags override settings', async () => {
    nock(BASE)
      .get('/search')
      .query({ search_term: 'boots', page: '1', region: 'IE' })
      .reply(200, { ads: [{ ad_id: '1' }] })
      .get('/search')
      .query({ search_term: 'boots', page: '2', region: 'IE' })
      .reply(200, { ads: [{ ad_id: '2' }] });
    const output = path.join(dir, 'custom', 'boots.csv');

    const code = await runCli(
      [
        '--settings', settingsPath,
        '--query', 'boots',
        '--region', 'IE',
        '--pages', '2',
        '--format', 'CSV',
        '--output', output,
        '-vv',
      ],
      { now: () => NOW, print }
    );

    expect(code).toBe(0);
    const rows: Record<string, string>[] = parse(await fs.readFile(output, 'utf-8'), {
      columns: true,
    });
    expect(rows.map((row) => row.adId)).toEqual(['1', '2']);
  });

  it('should prefer AD_LIBRARY_BASE_URL over the settings file', async () => {
    process.env.AD_LIBRARY_BASE_URL = 'https://mirror.example.com/search';
    const scope = nock('https://mirror.example.com')
      .get('/search')
      .query(true)
      .reply(200, { ads: [{ ad_id: 'm1' }] });

    const code = await runCli(['--settings', settingsPath, '--format', 'xml'], {
      now: () => NOW,
      print,
    });

    expect(code).toBe(0);
    expect(scope.isDone()).toBe(true);
    const xml = await fs.readFile(path.join(dir, 'data', 'ads_1700000000.xml'), 'utf-8');
    expect(xml).toContain('<adId>m1</adId>');
  });

  it('should exit cleanly without writing a file when no ads are found', async () => {
    nock(BASE).get('/search').query(true).reply(200, { ads: [] });

    const code = await runCli(['--settings', settingsPath], { now: () => NOW, print });

    expect(code).toBe(0);
    await expect(fs.access(path.join(dir, 'data'))).rejects.toThrow();
  });

  it('should exit 0 with no file when the first request fails', async () => {
    nock(BASE).get('/search').query(true).reply(403, 'Forbidden');

    const code = await runCli(['--settings', settingsPath], { now: () => NOW, print });

    expect(code).toBe(0);
    await expect(fs.access(path.join(dir, 'data'))).rejects.toThrow();
  });

  it('should exit 1 for an unsupported format before any request', async () => {
    const code = await runCli(['--settings', settingsPath, '--format', 'yaml'], { print });

    expect(code).toBe(1);
    await expect(fs.access(path.join(dir, 'data'))).rejects.toThrow();
  });

  it('should exit 1 when base_url is missing', async () => {
    const code = await runCli(['--settings', path.join(dir, 'missing.json')], { print });

    expect(code).toBe(1);
  });

  it('should exit 1 for an invalid page count', async () => {
    expect(await runCli(['--settings', settingsPath, '--pages', '0'], { print })).toBe(1);
    expect(await runCli(['--settings', settingsPath, '--pages', 'two'], { print })).toBe(1);
  });

  it('should exit 1 for malformed settings', async () => {
    await fs.writeFile(settingsPath, '{ not json');

    expect(await runCli(['--settings', settingsPath], { print })).toBe(1);
  });

  it('should print usage for --help', async () => {
    const code = await runCli(['--help'], { print });

    expect(code).toBe(0);
    expect(printed[0]).toMatch(/^Usage: ad-library-scraper \[options\]/);
  });

  it('should exit 1 with usage for unknown options', async () => {
    const code = await runCli(['--proxy', 'http://proxy'], { print });

    expect(code).toBe(1);
    expect(printed[0]).toContain('Usage: ad-library-scraper');
  });
});

describe('levelForVerbosity', () => {
  it('should map repeat counts to log levels', () => {
    expect(levelForVerbosity(0)).toBe('warn');
    expect(levelForVerbosity(1)).toBe('info');
    expect(levelForVerbosity(2)).toBe('debug');
    expect(levelForVerbosity(5)).toBe('debug');
  });
});
