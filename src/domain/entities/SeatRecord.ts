/**
 * A single seat-availability row produced by the scraper.
 * All fields arrive as page text; `seats` is not guaranteed to be numeric.
 */
export interface SeatRecord {
    topic: string;
    format: string;
    university: string;
    region: string;
    city: string;
    seats: string;
    date: string;
    deadline: string;
}

/**
 * Scrape results keyed by topic code, rows in page order.
 */
export type ResultsByTopic = Record<string, SeatRecord[]>;

export interface LocationSummary {
    region: string;
    city: string;
    seats: number;
    dateCount: number;
}

/**
 * Parses a seat cell. Anything that is not a plain integer counts as one seat.
 */
export function parseSeatCount(value: unknown): number {
    const text = String(value ?? '0').trim();
    if (/^[+-]?\d+$/.test(text)) {
        return parseInt(text, 10);
    }
    return 1;
}

/**
 * Aggregates rows by (region, city): seats summed, distinct non-empty dates counted.
 * Output is sorted by region, then city.
 */
export function summarizeByLocation(seats: SeatRecord[]): LocationSummary[] {
    const groups = new Map<string, { region: string; city: string; seats: number; dates: Set<string> }>();

    for (const seat of seats) {
        const region = seat.region ?? '';
        const city = seat.city ?? '';
        const key = JSON.stringify([region, city]);
        let group = groups.get(key);
        if (!group) {
            group = { region, city, seats: 0, dates: new Set<string>() };
            groups.set(key, group);
        }
        group.seats += parseSeatCount(seat.seats);
        const date = String(seat.date ?? '').trim();
        if (date) {
            group.dates.add(date);
        }
    }

    return Array.from(groups.values())
        .sort((a, b) => compareText(a.region, b.region) || compareText(a.city, b.city))
        .map((g) => ({ region: g.region, city: g.city, seats: g.seats, dateCount: g.dates.size }));
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
