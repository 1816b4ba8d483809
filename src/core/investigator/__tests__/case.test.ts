import * as os from 'os';
import * as path from 'path';
import fs from 'fs-extra';
import { describe, it, expect } from 'vitest';
import { CaseValidationError } from '../../errors';
import { loadCaseFile, parseCase, toolkitFor } from '../case';

const baseCase = {
  caseId: 'CASE_1',
  customerId: 'CUST_1',
  accountId: 'ACCT_1',
  category: 'account_takeover',
  description: 'Password reset followed by purchases',
};

describe('parseCase', () => {
  it('applies defaults and freezes the case', () => {
    const investigationCase = parseCase(baseCase);

    expect(investigationCase.timeWindowHours).toBe(24);
    expect(investigationCase.priority).toBe('medium');
    expect(Object.isFrozen(investigationCase)).toBe(true);
  });

  it('rejects missing fields and unknown categories with their paths', () => {
    const error = (() => {
      try {
        parseCase({ ...baseCase, accountId: undefined, category: 'shoplifting' });
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(CaseValidationError);
    if (error instanceof CaseValidationError) {
      expect(error.kind).toBe('CaseRejected');
      expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['accountId', 'category']);
    }
  });

  it('rejects a negative amount', () => {
    expect(() => parseCase({ ...baseCase, amount: -5 })).toThrow(/^Case rejected: amount: /);
  });
});

describe('toolkitFor', () => {
  it('sends fraud types to the fraud toolkit and alert types to aml', () => {
    expect(toolkitFor('account_takeover')).toBe('fraud');
    expect(toolkitFor('velocity_abuse')).toBe('fraud');
    expect(toolkitFor('cash_structuring')).toBe('aml');
    expect(toolkitFor('negative_news')).toBe('aml');
  });
});

describe('loadCaseFile', () => {
  it('loads the bundled example cases', async () => {
    const dir = path.resolve(__dirname, '../../../../examples/cases');

    const takeover = await loadCaseFile(path.join(dir, 'account-takeover.json'));
    const structuring = await loadCaseFile(path.join(dir, 'cash-structuring.json'));

    expect(toolkitFor(takeover.category)).toBe('fraud');
    expect(toolkitFor(structuring.category)).toBe('aml');
  });

  it('rejects a missing file', async () => {
    const missing = path.join(os.tmpdir(), 'invx-no-such-case.json');

    await expect(loadCaseFile(missing)).rejects.toThrow(`Case file not found: ${missing}`);
  });

  it('rejects a file that is not JSON', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invx-case-'));
    const file = path.join(dir, 'case.json');
    fs.outputFileSync(file, 'caseId: CASE_1');

    try {
      await expect(loadCaseFile(file)).rejects.toBeInstanceOf(CaseValidationError);
    } finally {
      fs.removeSync(dir);
    }
  });
});
