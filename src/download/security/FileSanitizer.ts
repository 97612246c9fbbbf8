/**
 * FileSanitizer - Safe output names for downloaded media
 */

// Dangerous file extensions
const DANGEROUS_EXTENSIONS = new Set([
    '.exe', '.bat', '.cmd', '.com', '.scr', '.pif', '.vbs', '.js',
    '.jar', '.msi', '.dll', '.ps1', '.sh', '.php', '.py', '.rb',
]);

const MIME_TO_EXTENSION: Record<string, string> = {
    'video/mp4': '.mp4',
    'video/webm': '.webm',
    'video/x-matroska': '.mkv',
    'video/quicktime': '.mov',
    'audio/mpeg': '.mp3',
    'audio/mp4': '.m4a',
    'audio/x-m4a': '.m4a',
    'audio/aac': '.aac',
    'audio/ogg': '.ogg',
    'audio/wav': '.wav',
    'audio/flac': '.flac',
};

export class FileSanitizer {
    /**
     * Sanitize filename removing dangerous characters
     */
    sanitizeFilename(filename: string): string {
        return filename
            // Remove path traversal attempts
            .replace(/\.\./g, '')
            // Remove dangerous characters
            .replace(/[<>:"/\\|?*\x00-\x1F]/g, '_')
            // Remove leading/trailing dots and spaces
            .replace(/^[\s.]+|[\s.]+$/g, '')
            // Limit length
            .substring(0, 200)
            // Replace multiple underscores
            .replace(/_+/g, '_')
            // Ensure not empty
            || 'download';
    }

    isDangerousExtension(filename: string): boolean {
        const dot = filename.lastIndexOf('.');
        return dot !== -1 && DANGEROUS_EXTENSIONS.has(filename.slice(dot).toLowerCase());
    }

    /**
     * Get file extension from MIME type (parameters such as charset are ignored)
     */
    getExtensionFromMime(mimeType: string | null | undefined): string | undefined {
        if (!mimeType) return undefined;
        const type = mimeType.split(';')[0].trim().toLowerCase();
        return Object.hasOwn(MIME_TO_EXTENSION, type) ? MIME_TO_EXTENSION[type] : undefined;
    }

    /**
     * Build a safe output name from a candidate name and the requested format
     * A name whose extension could execute gets the media extension appended
     */
    buildOutputName(candidate: string, extension: string | undefined): string {
        let name = this.sanitizeFilename(candidate);
        const ext = extension ? (extension.startsWith('.') ? extension : `.${extension}`) : undefined;

        if (ext && !name.toLowerCase().endsWith(ext.toLowerCase())) {
            name = `${name}${ext}`;
        } else if (this.isDangerousExtension(name)) {
            name = `${name}.download`;
        }
        return name;
    }
}
