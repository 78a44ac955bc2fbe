/**
 * PEOPLE AND ROLES
 *
 * A Person owns the only copy of identity, contact details and balance.
 * Roles are facets: views over one Person that add role attributes and
 * delegate everything else. A teaching assistant is a single Person seen
 * through both a Student and a Staff facet, so a deduction made through
 * one facet is what the other facet reads back.
 */

import {Identifiable, PersonDetails, RoleName, StaffAttributes, StudentAttributes} from '../domain';
import {InvalidAttributeError} from './InvalidAttributeError';
import {Maybe} from 'purify-ts';

export const DEFAULT_STUDENT_ATTRIBUTES: StudentAttributes = {
  maxConcurrentBorrows: 2,
  discountFactor: 0.8,
};

export const DEFAULT_STAFF_ATTRIBUTES: StaffAttributes = {
  canApprovePurchases: false,
};

// ============================================================================
// Shared record
// ============================================================================

export class Person implements Identifiable {
  private balance: number;

  constructor(private readonly details: PersonDetails) {
    const opening = details.balance ?? 0;
    this.balance = Number.isFinite(opening) ? Math.max(0, opening) : 0;
  }

  id(): string {
    return this.details.id;
  }

  getName(): string {
    return this.details.name;
  }

  getEmail(): string {
    return this.details.email;
  }

  getBalance(): number {
    return this.balance;
  }

  canCover(amount: number): boolean {
    return amount <= this.balance;
  }

  addFunds(amount: number): void {
    if (amount > 0) this.balance += amount;
  }

  /**
   * Insufficient funds are absorbed: the balance floors at zero.
   * Anything but a positive amount is ignored, so a deduction never adds funds.
   */
  deduct(amount: number): void {
    if (!(amount > 0)) return;
    this.balance = Math.max(0, this.balance - amount);
  }
}

// ============================================================================
// Facets
// ============================================================================

abstract class PersonFacet implements Identifiable {
  constructor(readonly person: Person) {}

  id(): string {
    return this.person.id();
  }

  getName(): string {
    return this.person.getName();
  }

  getEmail(): string {
    return this.person.getEmail();
  }

  getBalance(): number {
    return this.person.getBalance();
  }

  addFunds(amount: number): void {
    this.person.addFunds(amount);
  }

  deduct(amount: number): void {
    this.person.deduct(amount);
  }
}

export class StudentRole extends PersonFacet {
  private readonly attributes: StudentAttributes;

  constructor(person: Person, attributes: StudentAttributes = DEFAULT_STUDENT_ATTRIBUTES) {
    super(person);
    this.attributes = validateStudentAttributes(attributes);
  }

  // Reported only. Nothing rejects a borrow over the limit.
  getMaxConcurrentBorrows(): number {
    return this.attributes.maxConcurrentBorrows;
  }

  getDiscountFactor(): number {
    return this.attributes.discountFactor;
  }
}

export class StaffRole extends PersonFacet {
  constructor(person: Person, private readonly attributes: StaffAttributes = DEFAULT_STAFF_ATTRIBUTES) {
    super(person);
  }

  hasPurchaseApproval(): boolean {
    return this.attributes.canApprovePurchases;
  }
}

/**
 * A borrower: one Person plus whichever role facets apply to them.
 * Callers ask for a capability with {@link asStudent} / {@link asStaff}
 * instead of checking the concrete combination.
 */
export class LibraryUser extends PersonFacet {
  private readonly student: Maybe<StudentRole>;
  private readonly staff: Maybe<StaffRole>;

  constructor(
    person: Person,
    roles: { student?: StudentAttributes; staff?: StaffAttributes } = {}
  ) {
    super(person);
    this.student = Maybe.fromNullable(roles.student).map(attributes => new StudentRole(person, attributes));
    this.staff = Maybe.fromNullable(roles.staff).map(attributes => new StaffRole(person, attributes));
  }

  asStudent(): Maybe<StudentRole> {
    return this.student;
  }

  asStaff(): Maybe<StaffRole> {
    return this.staff;
  }

  roleName(): RoleName {
    if (this.student.isJust() && this.staff.isJust()) return 'TeachingAssistant';
    if (this.student.isJust()) return 'Student';
    if (this.staff.isJust()) return 'Staff';
    return 'Patron';
  }
}

// ============================================================================
// Constructors
// ============================================================================

export function createPatron(details: PersonDetails): LibraryUser {
  return new LibraryUser(new Person(details));
}

export function createStudent(
  details: PersonDetails,
  attributes: StudentAttributes = DEFAULT_STUDENT_ATTRIBUTES
): LibraryUser {
  return new LibraryUser(new Person(details), {student: attributes});
}

export function createStaff(
  details: PersonDetails,
  attributes: StaffAttributes = DEFAULT_STAFF_ATTRIBUTES
): LibraryUser {
  return new LibraryUser(new Person(details), {staff: attributes});
}

export function createTeachingAssistant(
  details: PersonDetails,
  student: StudentAttributes,
  staff: StaffAttributes
): LibraryUser {
  return new LibraryUser(new Person(details), {student, staff});
}

export function validateStudentAttributes(attributes: StudentAttributes): StudentAttributes {
  const {maxConcurrentBorrows, discountFactor} = attributes;
  if (!Number.isInteger(maxConcurrentBorrows) || maxConcurrentBorrows < 0) {
    throw new InvalidAttributeError('maxConcurrentBorrows', maxConcurrentBorrows, 'a non-negative integer');
  }
  if (!(discountFactor > 0 && discountFactor <= 1)) {
    throw new InvalidAttributeError('discountFactor', discountFactor, 'in (0, 1]');
  }
  return attributes;
}
