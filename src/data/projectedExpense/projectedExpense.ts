import { v4 as uuidv4 } from 'uuid';
import { INDIVIDUALS, isJointAccount, sameLabel, toIndividual } from '../account/account';
import type { Individual } from '../account/account';
import { normalizeCriticality } from '../transaction/transaction';
import type { NewProjectedExpense, ProjectedExpenseData, ProjectionSource } from './types';

/**
 * A planned spending amount for one person, tracked beside actual transactions.
 *
 * Joint plans are never stored as one record: `createProjectedExpenses` splits them into a
 * Josh and an Anna record carrying half the amount each, both flagged `isJoint`.
 */
export class ProjectedExpense {
  readonly id: string;
  readonly person: Individual;
  readonly criticality: string;
  readonly category: string;
  readonly amount: number;
  readonly isJoint: boolean;
  readonly source: ProjectionSource;
  readonly statementPeriod: string | null;
  readonly name: string | null;

  constructor(data: Omit<ProjectedExpenseData, 'id'> & { id?: string }) {
    this.id = data.id || uuidv4();
    this.person = data.person;
    this.criticality = normalizeCriticality(data.criticality);
    this.category = data.category.trim();
    this.amount = data.amount;
    this.isJoint = data.isJoint;
    this.source = data.source;
    this.statementPeriod = data.statementPeriod || null;
    this.name = data.name || null;
  }

  /**
   * True when this projection belongs to the given person, criticality and category.
   */
  matches(person: string, criticality: string, category: string): boolean {
    return (
      sameLabel(this.person, person) &&
      sameLabel(this.criticality, normalizeCriticality(criticality)) &&
      sameLabel(this.category, category)
    );
  }

  serialize(): ProjectedExpenseData {
    return {
      id: this.id,
      person: this.person,
      criticality: this.criticality,
      category: this.category,
      amount: this.amount,
      isJoint: this.isJoint,
      source: this.source,
      statementPeriod: this.statementPeriod,
      name: this.name,
    };
  }
}

/**
 * Creates the records for one planned expense: one for Josh or Anna, two halves for Joint.
 * @throws Error when the person is not Josh, Anna or Joint, or the amount is not a finite number
 */
export function createProjectedExpenses(input: NewProjectedExpense): ProjectedExpense[] {
  if (!Number.isFinite(input.amount)) {
    throw new Error('Projected amount must be a number');
  }
  if (!input.category || input.category.trim() === '') {
    throw new Error('Projected category is required');
  }
  const base = {
    criticality: input.criticality,
    category: input.category,
    source: input.source ?? 'manual',
    statementPeriod: input.statementPeriod ?? null,
    name: input.name ?? null,
  };

  if (isJointAccount(input.person)) {
    return INDIVIDUALS.map(
      (person) => new ProjectedExpense({ ...base, person, amount: input.amount / 2, isJoint: true }),
    );
  }
  const person = toIndividual(input.person);
  if (!person) {
    throw new Error(`Unknown person '${input.person}'`);
  }
  return [new ProjectedExpense({ ...base, person, amount: input.amount, isJoint: false })];
}
