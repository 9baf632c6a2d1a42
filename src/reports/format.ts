const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export const escapeHtml = (input: string): string => input.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

/** 1234567 → "1 234 567 Kč" */
export const formatPrice = (price: number): string => `${String(price).replace(/\B(?=(\d{3})+(?!\d))/g, ' ')} Kč`;

export const formatArea = (area: number | null): string => (area === null ? 'N/A' : `${area} m²`);

const DATE_PARTS = ['year', 'month', 'day', 'hour', 'minute', 'second'] as const;
type DatePart = (typeof DATE_PARTS)[number];

const isDatePart = (type: string): type is DatePart => DATE_PARTS.some((part) => part === type);

const dateParts = (iso: string, timeZone: string): Record<DatePart, string> => {
    const formatter = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    });
    const parts: Record<DatePart, string> = { year: '', month: '', day: '', hour: '', minute: '', second: '' };
    for (const { type, value } of formatter.formatToParts(new Date(iso))) {
        if (isDatePart(type)) parts[type] = value;
    }
    return parts;
};

/** "2024-05-01 14:30:00" in the given zone. */
export const formatTimestamp = (iso: string, timeZone: string): string => {
    const p = dateParts(iso, timeZone);
    return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
};

/** "2024-05-01 14:30" */
export const formatMinute = (iso: string, timeZone: string): string => formatTimestamp(iso, timeZone).slice(0, 16);

/** "05/01 14:30", used for the rows of a listing's timeline. */
export const formatShortDate = (iso: string, timeZone: string): string => {
    const p = dateParts(iso, timeZone);
    return `${p.month}/${p.day} ${p.hour}:${p.minute}`;
};
