import fs from 'fs/promises';
import * as XLSX from 'xlsx';
import { VideoRecord } from '../../domain/entities/VideoRecord';
import { IVideoRecordSource } from '../../domain/ports/IVideoRecordSource';

type CsvRow = Record<string, unknown>;

/**
 * Reads video records from a CSV file with a header row.
 * Only `video_id` is required; `title`, `channel`, `parent_category` and `fine_category` are optional.
 * Rows without a video_id are skipped.
 */
export class CsvVideoRecordLoader implements IVideoRecordSource {
    async load(csvPath: string): Promise<VideoRecord[]> {
        const content = await fs.readFile(csvPath, 'utf-8');
        return parseVideoRecords(content);
    }
}

/**
 * Parses CSV text into video records. All values are kept as text.
 */
export function parseVideoRecords(content: string): VideoRecord[] {
    const text = content.replace(/^\uFEFF/, '');
    if (text.trim().length === 0) {
        return [];
    }

    // raw: true keeps ids like "0123" or "1e5" as text instead of numbers.
    // FS pins the separator; SheetJS otherwise guesses it and may pick ';' or a tab.
    const options: XLSX.ParsingOptions & { FS: string } = { type: 'string', raw: true, FS: ',' };
    const workbook = XLSX.read(text, options);
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
        return [];
    }

    const rows = XLSX.utils.sheet_to_json<CsvRow>(workbook.Sheets[sheetName], { defval: '' });

    const records: VideoRecord[] = [];
    for (const row of rows) {
        const videoId = readCell(row, 'video_id');
        if (!videoId) {
            continue; // Skip rows without video_id
        }

        const record: VideoRecord = { videoId };
        const title = readCell(row, 'title');
        const channel = readCell(row, 'channel');
        const parentCategory = readCell(row, 'parent_category');
        const fineCategory = readCell(row, 'fine_category');

        if (title) record.title = title;
        if (channel) record.channel = channel;
        if (parentCategory) record.parentCategory = parentCategory;
        if (fineCategory) record.fineCategory = fineCategory;

        records.push(record);
    }

    return records;
}

function readCell(row: CsvRow, column: string): string {
    const value = row[column];
    if (value === undefined || value === null) {
        return '';
    }
    return String(value);
}
