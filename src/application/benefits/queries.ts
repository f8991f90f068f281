import type { Benefit } from '../../domain/employees/benefit.js';
import type { ReadStore } from '../persistence/store.js';

export class BenefitQueries {
  constructor(private readonly store: ReadStore) {}

  async getBenefits(): Promise<Benefit[]> {
    return this.store.listBenefits();
  }
}
