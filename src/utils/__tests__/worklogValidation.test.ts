import { describe, it, expect } from 'vitest';
import {
  isValidationResult,
  ProductionOrderLine,
  resolveMatch,
  validateAndScore,
  ValidationResult,
  WorklogBatchValidator,
  WorklogEntry,
  worklogNaturalKey,
} from '../worklogValidation';
import { InvalidQuantityError } from '../../lib/errors';

const line = (overrides: Partial<ProductionOrderLine> = {}): ProductionOrderLine => ({
  id: 1,
  orderNo: '2516572',
  model: 'M1',
  brandNo: 'B1',
  jobType: '钝化',
  quantity: 100,
  uploadDate: new Date('2025-11-01T00:00:00Z'),
  ...overrides,
});

const entry = (overrides: Partial<WorklogEntry> = {}): WorklogEntry => ({
  orderNo: '2516572',
  employeeId: 'E001',
  jobType: '钝化',
  quantity: 50,
  performanceFactor: 1.2,
  workDate: new Date('2025-11-08T02:00:00Z'),
  ...overrides,
});

describe('validateAndScore', () => {
  it('passes a worklog whose order and job type exist', () => {
    const target = line();
    expect(validateAndScore(entry(), [target])).toEqual({
      performanceFactor: '1.20',
      performanceAmount: '60.00',
      validationResult: ValidationResult.PASSED,
      match: target,
    });
  });

  it('marks unknown orders as unmatched but still scores them', () => {
    const result = validateAndScore(entry({ orderNo: '9999999' }), [line()]);
    expect(result.validationResult).toBe(ValidationResult.UNMATCHED);
    expect(result.performanceAmount).toBe('60.00');
    expect(result.match).toBeNull();
  });

  it('does not match another job type of the same order', () => {
    expect(validateAndScore(entry({ jobType: '抛光' }), [line()]).validationResult).toBe(ValidationResult.UNMATCHED);
  });

  it('tags duplicates before matching', () => {
    expect(validateAndScore(entry({ orderNo: '9999999' }), [], { duplicate: true }).validationResult).toBe(
      ValidationResult.DUPLICATE,
    );
  });

  it('throws for a bad quantity', () => {
    expect(() => validateAndScore(entry({ quantity: 0 }), [line()])).toThrow(InvalidQuantityError);
  });
});

describe('resolveMatch', () => {
  it('prefers the latest upload of the same product', () => {
    const older = line({ id: 1 });
    const newer = line({ id: 2, uploadDate: new Date('2025-11-05T00:00:00Z') });
    expect(resolveMatch(entry(), [older, newer])).toBe(newer);
  });

  it('leaves an entry unmatched when several models share the order and job', () => {
    const lines = [line({ id: 1 }), line({ id: 2, model: 'M2', brandNo: 'B2' })];
    expect(resolveMatch(entry(), lines)).toBeNull();
  });

  it('uses the entry model and brand to narrow the candidates', () => {
    const second = line({ id: 2, model: 'M2', brandNo: 'B2' });
    expect(resolveMatch(entry({ model: 'M2' }), [line({ id: 1 }), second])).toBe(second);
    expect(resolveMatch(entry({ model: 'M3' }), [line({ id: 1 }), second])).toBeNull();
  });
});

describe('WorklogBatchValidator', () => {
  it('flags the second identical worklog as a duplicate', () => {
    const validator = new WorklogBatchValidator([line()]);
    const first = validator.validate(entry());
    const second = validator.validate(entry());

    expect(first.validationResult).toBe(ValidationResult.PASSED);
    expect(second.validationResult).toBe(ValidationResult.DUPLICATE);
    expect(second.performanceAmount).toBe('60.00');
  });

  it('compares work dates by business day', () => {
    const validator = new WorklogBatchValidator([line()]);
    // 01:00 and 23:00 on 2025-11-08 at UTC+8
    validator.validate(entry({ workDate: new Date('2025-11-07T17:00:00Z') }));
    const sameDay = validator.validate(entry({ workDate: new Date('2025-11-08T15:00:00Z') }));
    // midnight of 2025-11-09
    const nextDay = validator.validate(entry({ workDate: new Date('2025-11-08T16:00:00Z') }));

    expect(sameDay.validationResult).toBe(ValidationResult.DUPLICATE);
    expect(nextDay.validationResult).toBe(ValidationResult.PASSED);
  });

  it('treats stored natural keys as duplicates', () => {
    const validator = new WorklogBatchValidator([line()], { existingKeys: [worklogNaturalKey(entry())] });
    expect(validator.validate(entry()).validationResult).toBe(ValidationResult.DUPLICATE);
  });

  it('ignores quota unless the check is enabled', () => {
    const validator = new WorklogBatchValidator([line()]);
    expect(validator.validate(entry({ quantity: 60 })).validationResult).toBe(ValidationResult.PASSED);
    expect(validator.validate(entry({ quantity: 50, employeeId: 'E002' })).validationResult).toBe(
      ValidationResult.PASSED,
    );
  });

  it('flags worklogs that exceed the order quantity when the check is enabled', () => {
    const validator = new WorklogBatchValidator([line()], { quotaCheck: true });
    expect(validator.validate(entry({ quantity: 60 })).validationResult).toBe(ValidationResult.PASSED);
    expect(validator.validate(entry({ quantity: 50, employeeId: 'E002' })).validationResult).toBe(
      ValidationResult.EXCEEDS_QUOTA,
    );
  });

  it('counts quantity already consumed by stored worklogs', () => {
    const validator = new WorklogBatchValidator([line()], { quotaCheck: true, consumed: [[1, 90]] });
    expect(validator.validate(entry({ quantity: 10 })).validationResult).toBe(ValidationResult.PASSED);
    expect(validator.validate(entry({ quantity: 1, employeeId: 'E002' })).validationResult).toBe(
      ValidationResult.EXCEEDS_QUOTA,
    );
  });

  it('collects rows with bad numbers and carries on', () => {
    const validator = new WorklogBatchValidator([line()]);
    const { scored, rejected } = validator.validateAll([
      entry(),
      entry({ quantity: 0, employeeId: 'E002' }),
      entry({ employeeId: 'E003' }),
    ]);

    expect(scored.map((s) => s.index)).toEqual([0, 2]);
    expect(scored.map((s) => s.result.validationResult)).toEqual([ValidationResult.PASSED, ValidationResult.PASSED]);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].index).toBe(1);
    expect(rejected[0].error).toBeInstanceOf(InvalidQuantityError);
  });
});

describe('isValidationResult', () => {
  it('accepts only known states', () => {
    expect(isValidationResult('通过')).toBe(true);
    expect(isValidationResult('passed')).toBe(false);
  });
});
