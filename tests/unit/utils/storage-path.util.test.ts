import { describe, it, expect } from 'vitest';
import {
    attachmentDisposition,
    buildObjectPath,
    decodeUploadFilename,
    md5Hex
} from '../../../src/utils/storage-path.util';

describe('Storage path utilities', () => {
    describe('md5Hex', () => {
        it('should hash strings and buffers alike', () => {
            expect(md5Hex('hello')).toBe('5d41402abc4b2a76b9719d911017c592');
            expect(md5Hex(Buffer.from('hello'))).toBe('5d41402abc4b2a76b9719d911017c592');
        });
    });

    describe('buildObjectPath', () => {
        it('should build date, email hash, uuid and extension segments', () => {
            const date = new Date(2026, 2, 5, 10, 30);
            const path = buildObjectPath('hello', 'abc-uuid', 'Quarterly Report.PDF', date);

            expect(path).toBe('2026/03/05/5d41402a/abc-uuid.PDF');
        });

        it('should leave the extension off when the file has none', () => {
            const date = new Date(2026, 11, 31);
            expect(buildObjectPath('hello', 'abc-uuid', 'Makefile', date)).toBe('2026/12/31/5d41402a/abc-uuid');
        });

        it('should keep only the last extension', () => {
            const date = new Date(2026, 0, 1);
            expect(buildObjectPath('hello', 'abc-uuid', 'backup.tar.gz', date)).toBe('2026/01/01/5d41402a/abc-uuid.gz');
        });
    });

    describe('attachmentDisposition', () => {
        it('should URL-encode the filename', () => {
            expect(attachmentDisposition('my report.pdf')).toBe('attachment; filename="my%20report.pdf"');
            expect(attachmentDisposition('报告.pdf')).toBe('attachment; filename="%E6%8A%A5%E5%91%8A.pdf"');
        });
    });

    describe('decodeUploadFilename', () => {
        it('should leave ASCII names untouched', () => {
            expect(decodeUploadFilename('report.pdf')).toBe('report.pdf');
        });

        it('should recover UTF-8 names that were read as latin1', () => {
            const garbled = Buffer.from('résumé.pdf', 'utf8').toString('latin1');
            expect(decodeUploadFilename(garbled)).toBe('résumé.pdf');
        });

        it('should keep genuine latin1 names', () => {
            expect(decodeUploadFilename('café.txt')).toBe('café.txt');
        });

        it('should keep names that are already proper unicode', () => {
            expect(decodeUploadFilename('报告.pdf')).toBe('报告.pdf');
        });
    });
});
