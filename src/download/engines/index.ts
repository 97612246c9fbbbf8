import { FileManager } from '../../utils/FileManager';
import { AppConfig } from '../../types';
import { FetchEngine } from '../core/types';
import { HttpEngine } from './HttpEngine';
import { YtDlpEngine } from './YtDlpEngine';

/**
 * Engine named by the configuration
 */
export function createEngine(config: AppConfig, fileManager: FileManager): FetchEngine {
    switch (config.engine) {
        case 'http':
            return new HttpEngine(fileManager);
        case 'yt-dlp':
            return new YtDlpEngine(fileManager, {
                binaryPath: config.ytDlpPath,
                cookies: config.ytDlpCookies,
            });
    }
}
