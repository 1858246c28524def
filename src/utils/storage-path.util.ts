import { createHash } from 'crypto';
import path from 'path';

export function md5Hex(content: Buffer | string): string {
    return createHash('md5').update(content).digest('hex');
}

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

/**
 * Object key for an upload: `YYYY/MM/DD/<email hash>/<uuid><ext>`.
 *
 * The email hash is the first eight hex digits of md5(email), which keeps
 * a user's files together without putting the address in the key.
 */
export function buildObjectPath(email: string, fileUuid: string, filename: string, date: Date = new Date()): string {
    const datePrefix = `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
    const emailHash = md5Hex(email).substring(0, 8);
    const extension = path.extname(filename);
    return `${datePrefix}/${emailHash}/${fileUuid}${extension}`;
}

/**
 * Value for the Content-Disposition header of a download.
 */
export function attachmentDisposition(filename: string): string {
    return `attachment; filename="${encodeURIComponent(filename)}"`;
}

/**
 * multer hands over multipart filenames decoded as latin1. Re-read the
 * bytes as UTF-8 and keep that version when it decodes cleanly.
 */
export function decodeUploadFilename(name: string): string {
    if (/[^\u0000-\u00ff]/.test(name)) {
        return name;
    }
    const decoded = Buffer.from(name, 'latin1').toString('utf8');
    return decoded.includes('\uFFFD') ? name : decoded;
}
