import { logger } from './logger';

/**
 * URLValidator - Syntactic checks for remote media references
 * Only the scheme and host are inspected; nothing is resolved over the network
 */
export class URLValidator {
  private readonly allowedProtocols = new Set(['http:', 'https:']);

  // Known platforms, used only to label jobs in logs
  private readonly platformPatterns: Array<[RegExp, string]> = [
    [/(^|\.)youtube\.com$/, 'YouTube'],
    [/(^|\.)youtu\.be$/, 'YouTube'],
    [/(^|\.)facebook\.com$/, 'Facebook'],
    [/(^|\.)fb\.watch$/, 'Facebook'],
    [/(^|\.)twitter\.com$/, 'Twitter/X'],
    [/(^|\.)x\.com$/, 'Twitter/X'],
    [/(^|\.)instagram\.com$/, 'Instagram'],
    [/(^|\.)tiktok\.com$/, 'TikTok'],
    [/(^|\.)vimeo\.com$/, 'Vimeo'],
    [/(^|\.)dailymotion\.com$/, 'Dailymotion'],
  ];

  /**
   * Validates a URL
   * @returns Validation result with the normalized URL when valid
   */
  validate(url: string): ValidationResult {
    const trimmed = url.trim();
    if (trimmed.length === 0) {
      return {
        valid: false,
        error: 'empty_url',
        message: 'URL is empty',
      };
    }

    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch (error) {
      logger.debug('Invalid URL format', {
        url: trimmed,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        valid: false,
        error: 'invalid_format',
        message: 'URL must look like https://host/path',
      };
    }

    if (!this.allowedProtocols.has(parsed.protocol)) {
      return {
        valid: false,
        error: 'unsupported_scheme',
        message: `Unsupported scheme ${parsed.protocol.replace(':', '')}; use http or https`,
      };
    }

    if (!parsed.hostname || !this.isPlausibleHost(parsed.hostname)) {
      return {
        valid: false,
        error: 'missing_host',
        message: 'URL has no usable host',
      };
    }

    return {
      valid: true,
      url: parsed.toString(),
      platform: this.detectPlatform(parsed.hostname.toLowerCase()),
    };
  }

  isValid(url: string): boolean {
    return this.validate(url).valid;
  }

  /**
   * Detects the platform from hostname
   */
  detectPlatform(hostname: string): string {
    const match = this.platformPatterns.find(([pattern]) => pattern.test(hostname));
    return match ? match[1] : 'Unknown';
  }

  private isPlausibleHost(hostname: string): boolean {
    // IPv6 literals, dotted names and localhost
    if (hostname.startsWith('[')) return true;
    if (hostname === 'localhost') return true;
    return /^[a-z0-9-]+(\.[a-z0-9-]+)+$/i.test(hostname);
  }
}

/**
 * Validation result interface
 */
export interface ValidationResult {
  valid: boolean;
  url?: string;
  error?: 'empty_url' | 'invalid_format' | 'unsupported_scheme' | 'missing_host';
  message?: string;
  platform?: string;
}
