/**
 * Unit tests for the individual field rules.
 * Each rule must return a boolean for any input, never throw.
 */

import {
    displayFieldInput,
    FIELD_RULES,
    isValidBirthDate,
    isValidGender,
    isValidIdentityNumber,
    isValidName,
    isValidPlace,
    RULE_NAMES,
    toFieldInput,
} from '../../src/core/validation/field-rules';
import { toLocalCalendarDay } from '../../src/core/common/utils';
import { PLACES, REFERENCE_DATE } from '../helpers/fixtures';

const text = (value: string) => toFieldInput(value);
const missing = toFieldInput(null);

describe('toFieldInput', () => {
    it('classifies strings, absence and other values', () => {
        expect(toFieldInput('abc')).toEqual({ kind: 'text', value: 'abc' });
        expect(toFieldInput('')).toEqual({ kind: 'text', value: '' });
        expect(toFieldInput(null)).toEqual({ kind: 'missing' });
        expect(toFieldInput(undefined)).toEqual({ kind: 'missing' });
        expect(toFieldInput(NaN)).toEqual({ kind: 'missing' });
        expect(toFieldInput(42)).toEqual({ kind: 'other', value: 42 });
        expect(toFieldInput(true)).toEqual({ kind: 'other', value: true });
    });

    it('renders values for failure descriptions', () => {
        expect(displayFieldInput(text(' raw '))).toBe(' raw ');
        expect(displayFieldInput(missing)).toBe('');
        expect(displayFieldInput(toFieldInput(12.5))).toBe('12.5');
        expect(displayFieldInput(toFieldInput(new Date(Date.UTC(1990, 7, 17, 12))))).toBe('17/08/1990');
    });
});

describe('isValidIdentityNumber (KK_NO / NIK)', () => {
    it('accepts 16 digits not ending in 0000', () => {
        expect(isValidIdentityNumber(text('1234567890123450'))).toBe(true);
        expect(isValidIdentityNumber(text('3201012345670001'))).toBe(true);
    });

    it('rejects a 17-digit value ending in 0000', () => {
        expect(isValidIdentityNumber(text('12345678901230000'))).toBe(false);
    });

    it('rejects 16 digits ending in 0000', () => {
        expect(isValidIdentityNumber(text('1234567890120000'))).toBe(false);
    });

    it('rejects wrong lengths and non-digit characters', () => {
        expect(isValidIdentityNumber(text('123456789012345'))).toBe(false);
        expect(isValidIdentityNumber(text('12345678901234a6'))).toBe(false);
        expect(isValidIdentityNumber(text(' 1234567890123456'))).toBe(false);
        expect(isValidIdentityNumber(text('1234-5678-9012-3456'))).toBe(false);
        expect(isValidIdentityNumber(text('١٢٣٤٥٦٧٨٩٠١٢٣٤٥٦'))).toBe(false);
        expect(isValidIdentityNumber(text(''))).toBe(false);
    });

    it('rejects missing and non-text values', () => {
        expect(isValidIdentityNumber(missing)).toBe(false);
        expect(isValidIdentityNumber(toFieldInput(1234567890123456))).toBe(false);
    });
});

describe('isValidName', () => {
    it('accepts text without digits', () => {
        expect(isValidName(text('Siti Rahmawati'))).toBe(true);
        expect(isValidName(text("O'Neil-Putra"))).toBe(true);
    });

    it('rejects text containing any decimal digit', () => {
        expect(isValidName(text('Budi 2'))).toBe(false);
        expect(isValidName(text('Budi ٣'))).toBe(false);
    });

    it('rejects superscript, subscript and circled digits', () => {
        expect(isValidName(text('Ana²'))).toBe(false);
        expect(isValidName(text('Ana₃'))).toBe(false);
        expect(isValidName(text('Ana ①'))).toBe(false);
    });

    it('allows numeric symbols that are not digits', () => {
        expect(isValidName(text('Ana ½'))).toBe(true);
    });

    it('rejects missing and non-text values', () => {
        expect(isValidName(missing)).toBe(false);
        expect(isValidName(toFieldInput(true))).toBe(false);
    });
});

describe('isValidGender', () => {
    it('accepts mixed case and padded spellings', () => {
        expect(isValidGender(text('  perempuan '))).toBe(true);
        expect(isValidGender(text('laki-laki'))).toBe(true);
        expect(isValidGender(text('Laki Laki'))).toBe(true);
        expect(isValidGender(text('LAKI - LAKI'))).toBe(true);
    });

    it('rejects values outside the accepted set', () => {
        expect(isValidGender(text('WANITA'))).toBe(false);
        expect(isValidGender(text('L'))).toBe(false);
        expect(isValidGender(text('LAKILAKI'))).toBe(false);
        expect(isValidGender(missing)).toBe(false);
        expect(isValidGender(toFieldInput(1))).toBe(false);
    });
});

describe('isValidPlace', () => {
    it('ignores case and surrounding whitespace', () => {
        expect(isValidPlace(text('jakarta'), PLACES)).toBe(true);
        expect(isValidPlace(text('  Bandung  '), PLACES)).toBe(true);
    });

    it('rejects places outside the reference set', () => {
        expect(isValidPlace(text('MEDAN'), PLACES)).toBe(false);
        expect(isValidPlace(text('jakarta'), new Set<string>())).toBe(false);
    });

    it('rejects missing and non-text values', () => {
        expect(isValidPlace(missing, PLACES)).toBe(false);
        expect(isValidPlace(toFieldInput(7), PLACES)).toBe(false);
    });
});

describe('isValidBirthDate', () => {
    it('accepts past dates in DD/MM/YYYY', () => {
        expect(isValidBirthDate(text('01/01/2000'), REFERENCE_DATE)).toBe(true);
        expect(isValidBirthDate(text('1/2/2000'), REFERENCE_DATE)).toBe(true);
        expect(isValidBirthDate(text('29/02/2000'), REFERENCE_DATE)).toBe(true);
    });

    it('accepts the reference day itself and rejects the day after', () => {
        expect(isValidBirthDate(text('01/06/2024'), REFERENCE_DATE)).toBe(true);
        expect(isValidBirthDate(text('02/06/2024'), REFERENCE_DATE)).toBe(false);
    });

    it('rejects future dates', () => {
        expect(isValidBirthDate(text('31/12/2999'), REFERENCE_DATE)).toBe(false);
    });

    it('rejects other formats and impossible dates', () => {
        expect(isValidBirthDate(text('2000-01-01'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text('01-01-2000'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text('01/01/00'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text(' 01/01/2000'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text('30/02/2001'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text('12/13/2000'), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(text(''), REFERENCE_DATE)).toBe(false);
    });

    it('follows the local day of the reference instant', () => {
        const lateEvening = toLocalCalendarDay(new Date(2024, 5, 1, 23, 30));
        const earlyMorning = toLocalCalendarDay(new Date(2024, 5, 2, 0, 30));

        expect(isValidBirthDate(text('01/06/2024'), lateEvening)).toBe(true);
        expect(isValidBirthDate(text('02/06/2024'), lateEvening)).toBe(false);
        expect(isValidBirthDate(text('02/06/2024'), earlyMorning)).toBe(true);
    });

    it('accepts valid Date values and rejects missing ones', () => {
        expect(isValidBirthDate(toFieldInput(new Date(Date.UTC(1985, 2, 3, 12))), REFERENCE_DATE)).toBe(true);
        expect(isValidBirthDate(toFieldInput(new Date(NaN)), REFERENCE_DATE)).toBe(false);
        expect(isValidBirthDate(missing, REFERENCE_DATE)).toBe(false);
    });
});

describe('FIELD_RULES', () => {
    it('lists the six rules in reporting order', () => {
        expect(RULE_NAMES).toEqual(['KK_NO', 'NIK', 'Name', 'Gender', 'Place', 'Birth Date']);
        expect(FIELD_RULES.map(rule => rule.column)).toEqual([
            'KK_NO', 'NIK', 'CUSTNAME', 'JENIS_KELAMIN', 'TEMPAT_LAHIR', 'TANGGAL_LAHIR',
        ]);
        expect(FIELD_RULES.map(rule => rule.message)).toEqual([
            'Invalid KK_NO', 'Invalid NIK', 'Invalid Name', 'Invalid Gender', 'Invalid Place', 'Invalid Birth Date',
        ]);
    });
});
