import {
    formatDateToDDMMYYYY,
    formatPercentage,
    isOnOrBeforeDay,
    parseDayMonthYear,
    toLocalCalendarDay,
} from '../../src/core/common/utils';

describe('parseDayMonthYear', () => {
    it('parses one- and two-digit day and month to UTC noon', () => {
        expect(parseDayMonthYear('17/08/1945')?.toISOString()).toBe('1945-08-17T12:00:00.000Z');
        expect(parseDayMonthYear('1/2/2000')?.toISOString()).toBe('2000-02-01T12:00:00.000Z');
    });

    it('rejects dates that do not exist', () => {
        expect(parseDayMonthYear('29/02/2001')).toBeNull();
        expect(parseDayMonthYear('31/04/2020')).toBeNull();
        expect(parseDayMonthYear('00/01/2020')).toBeNull();
        expect(parseDayMonthYear('01/01/0000')).toBeNull();
    });

    it('keeps early four-digit years literal', () => {
        expect(parseDayMonthYear('01/01/0050')?.getUTCFullYear()).toBe(50);
    });

    it('rejects other layouts', () => {
        expect(parseDayMonthYear('2000/01/01')).toBeNull();
        expect(parseDayMonthYear('01/01/2000 ')).toBeNull();
        expect(parseDayMonthYear('001/01/2000')).toBeNull();
    });
});

describe('formatDateToDDMMYYYY', () => {
    it('zero-pads day and month', () => {
        expect(formatDateToDDMMYYYY(new Date(Date.UTC(2000, 1, 1, 12)))).toBe('01/02/2000');
    });

    it('returns an empty string for absent or invalid dates', () => {
        expect(formatDateToDDMMYYYY(null)).toBe('');
        expect(formatDateToDDMMYYYY(new Date(NaN))).toBe('');
    });
});

describe('isOnOrBeforeDay', () => {
    const reference = new Date(Date.UTC(2024, 5, 1, 0, 5));

    it('compares calendar days, ignoring time of day', () => {
        expect(isOnOrBeforeDay(new Date(Date.UTC(2024, 5, 1, 23, 59)), reference)).toBe(true);
        expect(isOnOrBeforeDay(new Date(Date.UTC(2024, 4, 31, 12)), reference)).toBe(true);
        expect(isOnOrBeforeDay(new Date(Date.UTC(2024, 5, 2, 0)), reference)).toBe(false);
    });
});

describe('toLocalCalendarDay', () => {
    it('keeps the local calendar day late in the evening', () => {
        const evening = new Date(2024, 5, 1, 23, 30);

        expect(toLocalCalendarDay(evening).getTime()).toBe(Date.UTC(2024, 5, 1, 12));
    });

    it('keeps the local calendar day just after midnight', () => {
        const earlyMorning = new Date(2024, 5, 2, 0, 30);

        expect(toLocalCalendarDay(earlyMorning).getTime()).toBe(Date.UTC(2024, 5, 2, 12));
    });
});

describe('formatPercentage', () => {
    it('formats one decimal place', () => {
        expect(formatPercentage(2, 3)).toBe('66.7%');
        expect(formatPercentage(0, 4)).toBe('0.0%');
        expect(formatPercentage(4, 4)).toBe('100.0%');
    });

    it('reports N/A for an empty total', () => {
        expect(formatPercentage(0, 0)).toBe('N/A');
    });
});
