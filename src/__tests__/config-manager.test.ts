import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigManager } from '../config-manager.js';
import { createDefaultResolver } from '../config-resolver.js';
import { FORMAT_DATE } from '../date-utils.js';
import { ConfigNotFoundError, ConfigValidationError } from '../errors.js';
import { createLoggerStub } from '../helper/test-logger-stub.js';
import { createSelectStub } from '../helper/test-select-stub.js';

const VACATION_DOC = {
  firstName: 'Jane',
  lastName: 'Doe',
  year: 2025,
  region: 'tg',
  vacationBlocks: [{ description: 'Christmas', start: '2025-12-22', end: '2025-12-28' }],
};

const HOLIDAY_DOC = {
  region: 'TG',
  year: 2025,
  holidays: [{ date: '2025-12-25', description: 'Christmas Day' }],
};

const ICS_CONTENT = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Test//EN',
  'BEGIN:VEVENT',
  'UID:christmas@test',
  'DTSTART;VALUE=DATE:20251225',
  'SUMMARY:Christmas Day',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:national-day@test',
  'DTSTART;VALUE=DATE:20250801',
  'SUMMARY:National Day',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n');

describe('ConfigManager', () => {
  let confDir: string;

  async function writeConf(name: string, content: unknown): Promise<string> {
    const filePath = path.join(confDir, name);
    const data = typeof content === 'string' ? content : JSON.stringify(content, null, 2);
    await fs.writeFile(filePath, data, 'utf-8');
    return filePath;
  }

  beforeEach(async () => {
    confDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vacation-planner-conf-'));
  });

  afterEach(async () => {
    await fs.rm(confDir, { recursive: true, force: true });
  });

  describe('discover', () => {
    beforeEach(async () => {
      await writeConf('vacation-planer.json', VACATION_DOC);
      await writeConf('vacation-planner-2.json', VACATION_DOC);
      await writeConf('holidays-tg-2025.json', HOLIDAY_DOC);
      await writeConf('tg.ics', ICS_CONTENT);
      await writeConf('notes.txt', 'not a config');
      await fs.mkdir(path.join(confDir, 'holidays-archive.json'));
    });

    it('finds vacation files by name', async () => {
      const manager = new ConfigManager(confDir, createLoggerStub());

      expect(await manager.discover('vacation')).toEqual([
        path.join(confDir, 'vacation-planer.json'),
        path.join(confDir, 'vacation-planner-2.json'),
      ]);
    });

    it('finds holiday JSON and iCal files, skipping directories', async () => {
      const manager = new ConfigManager(confDir, createLoggerStub());

      expect(await manager.discover('holiday')).toEqual([
        path.join(confDir, 'holidays-tg-2025.json'),
        path.join(confDir, 'tg.ics'),
      ]);
    });
  });

  it('fails when the conf directory does not exist', async () => {
    const missing = path.join(confDir, 'missing');
    const manager = new ConfigManager(missing, createLoggerStub());

    await expect(manager.discover('vacation')).rejects.toThrow(ConfigNotFoundError);
    await expect(manager.discover('vacation')).rejects.toThrow(
      `Configuration path does not exist: ${missing}`
    );
  });

  describe('loadVacationConfig', () => {
    it('loads the only vacation file', async () => {
      await writeConf('vacation-planer.json', VACATION_DOC);
      const manager = new ConfigManager(confDir, createLoggerStub());

      const config = await manager.loadVacationConfig(createDefaultResolver({ interactive: false }));

      expect(config.firstName).toBe('Jane');
      expect(config.vacationBlocks[0].start.format(FORMAT_DATE)).toBe('2025-12-22');
    });

    it('prompts when several vacation files exist', async () => {
      await writeConf('vacation-planer.json', VACATION_DOC);
      await writeConf('vacation-planer-john.json', { ...VACATION_DOC, firstName: 'John' });
      const stub = createSelectStub(0);
      const manager = new ConfigManager(confDir, createLoggerStub());

      const config = await manager.loadVacationConfig(createDefaultResolver({ select: stub.select }));

      // 'vacation-planer-john.json' sorts before 'vacation-planer.json'
      expect(config.firstName).toBe('John');
      expect(stub.calls[0].message).toBe('Select a vacation configuration file:');
    });

    it('fails when there is no vacation file', async () => {
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(
        manager.loadVacationConfig(createDefaultResolver({ interactive: false }))
      ).rejects.toThrow(`No vacation configuration files found in ${confDir}`);
    });

    it('fails when several files exist and none is chosen', async () => {
      await writeConf('vacation-planer-a.json', VACATION_DOC);
      await writeConf('vacation-planer-b.json', VACATION_DOC);
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(
        manager.loadVacationConfig(createDefaultResolver({ interactive: false }))
      ).rejects.toThrow('No vacation configuration file was selected');
    });

    it('propagates validation errors', async () => {
      await writeConf('vacation-planer.json', { ...VACATION_DOC, year: undefined });
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(
        manager.loadVacationConfig(createDefaultResolver({ interactive: false }))
      ).rejects.toThrow(ConfigValidationError);
    });
  });

  describe('loadHolidayConfig', () => {
    it('picks the file matching region and year', async () => {
      await writeConf('holidays-tg-2025.json', HOLIDAY_DOC);
      await writeConf('holidays-zh-2025.json', { ...HOLIDAY_DOC, region: 'ZH' });
      const manager = new ConfigManager(confDir, createLoggerStub());

      const config = await manager.loadHolidayConfig(
        createDefaultResolver({ interactive: false }),
        'tg',
        2025
      );

      expect(config.region).toBe('TG');
      expect(config.holidays.map((h) => h.description)).toEqual(['Christmas Day']);
    });

    it('uses an explicit holiday file outside the conf directory', async () => {
      const explicit = path.join(confDir, 'custom.json');
      await writeConf('custom.json', { ...HOLIDAY_DOC, region: 'custom' });
      const manager = new ConfigManager(confDir, createLoggerStub());

      const config = await manager.loadHolidayConfig(
        createDefaultResolver({ holidayConfigPath: explicit, interactive: false })
      );

      expect(config.region).toBe('custom');
    });
  });

  describe('loadHolidayFile', () => {
    it('reads iCal files', async () => {
      const filePath = await writeConf('holidays-tg-2025.ics', ICS_CONTENT);
      const logger = createLoggerStub();
      const manager = new ConfigManager(confDir, logger);

      const config = await manager.loadHolidayFile(filePath);

      expect(config.region).toBe('holidays-tg-2025');
      expect(config.year).toBe(2025);
      expect(config.holidays.map((h) => [h.date.format(FORMAT_DATE), h.description])).toEqual([
        ['2025-12-25', 'Christmas Day'],
        ['2025-08-01', 'National Day'],
      ]);
      expect(logger.info).toHaveBeenCalledWith(`Loading iCal holiday file: ${filePath}`);
    });

    it('rejects unsupported extensions', async () => {
      const filePath = await writeConf('holidays.txt', 'Christmas');
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(manager.loadHolidayFile(filePath)).rejects.toThrow(
        `Unsupported holiday config file format: ${filePath}`
      );
    });

    it('rejects malformed iCal content', async () => {
      const filePath = await writeConf('broken.ics', 'not a calendar');
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(manager.loadHolidayFile(filePath)).rejects.toThrow(
        `Invalid iCal format in holiday file: ${filePath}`
      );
    });

    it('rejects malformed JSON', async () => {
      const filePath = await writeConf('holidays-tg-2025.json', '{ "region": ');
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(manager.loadHolidayFile(filePath)).rejects.toThrow(
        `Invalid JSON format in holiday file: ${filePath}`
      );
    });

    it('reports a missing file as not found', async () => {
      const filePath = path.join(confDir, 'holidays-gone-2025.json');
      const manager = new ConfigManager(confDir, createLoggerStub());

      await expect(manager.loadHolidayFile(filePath)).rejects.toThrow(ConfigNotFoundError);
    });
  });

  it('uses the current year for an iCal file without events', () => {
    const manager = new ConfigManager(confDir, createLoggerStub());
    const doc = manager.parseIcsHolidays(
      'BEGIN:VCALENDAR\r\nVERSION:2.0\r\nEND:VCALENDAR\r\n',
      '/tmp/empty.ics'
    );

    expect(doc).toEqual({ region: 'empty', year: new Date().getFullYear(), holidays: [] });
  });
});
