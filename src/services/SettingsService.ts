// src/services/SettingsService.ts
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { AppSettings, DEFAULT_SETTINGS, WeightConfig } from '../core/app-types';
import { SETTINGS_FILE } from '../core/constants';
import { InvalidSettingsError } from '../core/errors';
import { describeIssues, settingsFileSchema } from '../core/validation';

type SettingsKey = keyof AppSettings;

export class SettingsService {
  private readonly file: string;
  private stored: Promise<Partial<AppSettings>> | null = null;

  constructor(repoPath: string) {
    this.file = path.join(repoPath, SETTINGS_FILE);
  }

  /**
   * Retrieves a specific setting's value.
   * If the settings file does not set it, it returns the default value.
   * @param key The setting to retrieve.
   */
  public async get<K extends SettingsKey>(key: K): Promise<AppSettings[K]> {
    const data = await this.load();
    return data[key] ?? DEFAULT_SETTINGS[key];
  }

  /**
   * The stored weights with command-line overrides applied on top.
   */
  public async getWeights(overrides: Partial<WeightConfig> = {}): Promise<WeightConfig> {
    return {
      minCommits: overrides.minCommits ?? (await this.get('minCommits')),
      maxCommits: overrides.maxCommits ?? (await this.get('maxCommits')),
      weekendWeight: overrides.weekendWeight ?? (await this.get('weekendWeight')),
      weekdayWeight: overrides.weekdayWeight ?? (await this.get('weekdayWeight')),
      holidayWeight: overrides.holidayWeight ?? (await this.get('holidayWeight')),
      vacationWeeksPerYear: overrides.vacationWeeksPerYear ?? (await this.get('vacationWeeksPerYear')),
    };
  }

  private load(): Promise<Partial<AppSettings>> {
    if (!this.stored) this.stored = this.read();
    return this.stored;
  }

  private async read(): Promise<Partial<AppSettings>> {
    let text: string;
    try {
      text = await readFile(this.file, 'utf8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return {};
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err: unknown) {
      throw new InvalidSettingsError(this.file, err instanceof Error ? err.message : String(err));
    }

    const parsed = settingsFileSchema.safeParse(json);
    if (!parsed.success) throw new InvalidSettingsError(this.file, describeIssues(parsed.error));
    return parsed.data;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
