/**
 * Unit tests for ERP payload parsing
 */

import { normalizeStaffId, parseEmployeePayload, parseEmployeeRecord } from '../erpRecordSchema.js';
import { TransientRemoteError } from '../../../utils/errors.js';

describe('normalizeStaffId', () => {
    it('trims and upper-cases', () => {
        expect(normalizeStaffId('  emp1001 ')).toBe('EMP1001');
    });
});

describe('parseEmployeeRecord', () => {
    it('reads upper-case ERP field names', () => {
        const record = parseEmployeeRecord({
            STAFFID: 'emp1001',
            FULLNAME: 'Jane Wanjiru',
            NATIONAL_IDENTIFIER: '12345678',
            ORGANISATION: 'Flight Operations',
            PERSON_TYPE: 'Ex-employee',
            HIRE_DATE: '2010-01-04',
            ACTUAL_TERMINATION_DATE: '2024-06-30',
        });

        expect(record).toEqual({
            staffId: 'EMP1001',
            fullName: 'Jane Wanjiru',
            nationalId: '12345678',
            department: 'Flight Operations',
            employmentStatus: 'Ex-employee',
            hireDate: new Date('2010-01-04'),
            exitDate: new Date('2024-06-30'),
        });
    });

    it('reads lower-case field names and numeric ids', () => {
        const record = parseEmployeeRecord({ staffid: 4521, fullname: 'Ann Otieno' });

        expect(record?.staffId).toBe('4521');
        expect(record?.fullName).toBe('Ann Otieno');
        expect(record?.exitDate).toBeNull();
    });

    it('turns the nil marker and blanks into null', () => {
        const record = parseEmployeeRecord({
            STAFFID: 'EMP1002',
            FULLNAME: '   ',
            ACTUAL_TERMINATION_DATE: { '@nil': 'true' },
        });

        expect(record?.fullName).toBeNull();
        expect(record?.exitDate).toBeNull();
    });

    it('turns an unparseable date into null', () => {
        const record = parseEmployeeRecord({ STAFFID: 'EMP1003', ACTUAL_TERMINATION_DATE: 'not-a-date' });

        expect(record?.exitDate).toBeNull();
    });

    it('returns null without a staff id', () => {
        expect(parseEmployeeRecord({ FULLNAME: 'No Id' })).toBeNull();
        expect(parseEmployeeRecord({ STAFFID: { '@nil': 'true' } })).toBeNull();
        expect(parseEmployeeRecord('EMP1001')).toBeNull();
    });
});

describe('parseEmployeePayload', () => {
    it('accepts a bare array and counts skipped rows', () => {
        const result = parseEmployeePayload([{ STAFFID: 'A1' }, { FULLNAME: 'x' }, { STAFFID: 'A2' }]);

        expect(result.records.map((r) => r.staffId)).toEqual(['A1', 'A2']);
        expect(result.skipped).toBe(1);
    });

    it('accepts the wrapped view', () => {
        const result = parseEmployeePayload({ ExEmployeesView: [{ STAFFID: 'A1' }] });

        expect(result.records).toHaveLength(1);
        expect(result.skipped).toBe(0);
    });

    it('accepts a single row object', () => {
        const result = parseEmployeePayload({ STAFFID: 'A9', FULLNAME: 'Solo Row' });

        expect(result.records.map((r) => r.staffId)).toEqual(['A9']);
    });

    it('rejects a body that is not a record set', () => {
        expect(() => parseEmployeePayload('<html>maintenance</html>')).toThrow(TransientRemoteError);
        expect(() => parseEmployeePayload(null)).toThrow('ERP returned an unrecognised response body');
    });
});
