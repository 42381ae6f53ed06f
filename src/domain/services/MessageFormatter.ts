import { ITranslator } from '../ports/ITranslator';
import { SeatRecord, summarizeByLocation } from '../entities/SeatRecord';

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

/**
 * Builds the single aggregated alert for one topic:
 * one line per (region, city) with summed seats and the number of distinct dates.
 */
export function formatTopicSummary(
    topic: string,
    seats: SeatRecord[],
    translator: ITranslator,
    bookingUrl: string
): string {
    const lines = [`\u{1F6A8} <b>${escapeHtml(topic)}</b>`, ''];

    for (const location of summarizeByLocation(seats)) {
        lines.push(
            `\u{1F4CD} <b>${escapeHtml(location.region || '-')}</b> – ${escapeHtml(location.city || '-')}: ` +
            `${location.seats} ${translator.t('seats')}, ${location.dateCount} ${translator.t('dates')}`
        );
    }

    lines.push('', `\u{1F517} <a href='${escapeHtml(bookingUrl)}'>\u{1F4CC} ${translator.t('book_now')}</a>`);
    return lines.join('\n');
}

/**
 * Numbered topic list used by the /exam menu.
 */
export function formatTopicMenu(topics: string[], translator: ITranslator): string {
    const items = topics.map((topic, i) => `${i + 1}. ${topic}`);
    return `${translator.t('exam_select_prompt')}\n\n${items.join('\n')}`;
}
