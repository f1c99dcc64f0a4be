import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import AdmZip from 'adm-zip';
import { execFile } from 'child_process';
import { access, chmod, copyFile, mkdir, rename, writeFile } from 'fs/promises';
import * as path from 'path';
import { firstValueFrom } from 'rxjs';
import { promisify } from 'util';
import { EnvironmentVariables } from '../config/env.validation';
import {
  ChromeVersion,
  DriverSource,
  LEGACY_DRIVER_INDEX_URL,
  parseChromeVersion,
  selectDriverSource,
} from './chrome-version';

const execFileAsync = promisify(execFile);

/** Directory the chrome-for-testing archive unpacks into. */
const CFT_ARCHIVE_DIR = 'chromedriver-linux64';
const DRIVER_BINARY = 'chromedriver';

/**
 * Stages a chromedriver binary matching the locally installed Chrome.
 *
 * The legacy index answers `LATEST_RELEASE_<major>` for Chrome up to 114.
 * Newer majors are only published on chrome-for-testing, where the archive
 * is addressed by the full build number and nests the binary one level down.
 */
@Injectable()
export class ChromedriverService {
  private readonly logger = new Logger(ChromedriverService.name);

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  async readInstalledVersion(): Promise<ChromeVersion> {
    const binary = this.config.get('CHROME_BINARY', { infer: true });
    const { stdout } = await execFileAsync(binary, ['--product-version']);
    return parseChromeVersion(stdout);
  }

  async resolveSource(chrome: ChromeVersion): Promise<DriverSource> {
    const url = `${LEGACY_DRIVER_INDEX_URL}/LATEST_RELEASE_${chrome.major}`;
    const response = await firstValueFrom(
      this.http.get<string>(url, {
        responseType: 'text',
        // 404 carries the NoSuchKey body; anything else non-2xx is a real failure
        validateStatus: (status) => (status >= 200 && status < 300) || status === 404,
      }),
    );
    const body = typeof response.data === 'string' ? response.data : '';
    const source = selectDriverSource(chrome, body);

    if (source.kind === 'chrome-for-testing') {
      this.logger.warn(
        `No legacy chromedriver release for Chrome ${chrome.major}, using chrome-for-testing ${chrome.full}`,
      );
    }
    return source;
  }

  /**
   * Downloads (unless already present) and unpacks the archive into
   * `<dir>/<version>`. The archive lands under a `.part` name first and is
   * renamed once complete.
   * @returns absolute path of the staged binary
   */
  async install(source: DriverSource, dir: string): Promise<string> {
    const targetDir = path.resolve(dir, source.version);
    await mkdir(targetDir, { recursive: true });

    const archivePath = path.join(targetDir, path.basename(new URL(source.url).pathname));
    if (await exists(archivePath)) {
      this.logger.log(`Reusing ${archivePath}`);
    } else {
      this.logger.log(`Downloading ${source.url}`);
      const { data } = await firstValueFrom(
        this.http.get<ArrayBuffer>(source.url, { responseType: 'arraybuffer' }),
      );
      const partialPath = `${archivePath}.part`;
      await writeFile(partialPath, Buffer.from(data));
      await rename(partialPath, archivePath);
    }

    new AdmZip(archivePath).extractAllTo(targetDir, true);

    const driverPath = path.join(targetDir, DRIVER_BINARY);
    if (source.kind === 'chrome-for-testing') {
      await copyFile(path.join(targetDir, CFT_ARCHIVE_DIR, DRIVER_BINARY), driverPath);
    }
    await chmod(driverPath, 0o755);

    return driverPath;
  }

  async provision(): Promise<string> {
    const chrome = await this.readInstalledVersion();
    this.logger.log(`Detected Chrome ${chrome.full}`);

    const source = await this.resolveSource(chrome);
    const driverPath = await this.install(source, this.config.get('CHROMEDRIVER_DIR', { infer: true }));

    this.logger.log(`chromedriver ${source.version} staged at ${driverPath}`);
    return driverPath;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}
