import { describe, it, expect } from 'vitest';
import { carePackRouter } from '../../../src/careplan-api/routes/care-pack';

describe('care pack router', () => {
  it('exports a router', () => {
    expect(carePackRouter).toBeDefined();
    expect(carePackRouter.stack).toBeDefined();
  });
});
