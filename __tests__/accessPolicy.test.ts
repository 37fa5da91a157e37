/**
 * Access Policy Tests
 *
 * Covers the full decision table for anonymous, buyer and seller callers,
 * product ownership, and the purity of evaluate().
 */

import { describe, it, expect } from 'vitest';
import {
  ANONYMOUS,
  Action,
  Caller,
  Decision,
  DenyReason,
  ResourceType,
  callerFromUser,
  evaluate,
} from '../src/policy/AccessPolicy';

const buyer: Caller = { kind: 'user', id: 7, isSeller: false };
const seller: Caller = { kind: 'user', id: 3, isSeller: true };
const otherSeller: Caller = { kind: 'user', id: 4, isSeller: true };

const ALLOW: Decision = { allowed: true };
const deny = (reason: DenyReason): Decision => ({ allowed: false, reason });

describe('Access Policy', () => {
  describe('decision table', () => {
    const rows: Array<[string, Action, ResourceType, Decision, Decision, Decision]> = [
      ['login', Action.Create, ResourceType.Session, ALLOW, ALLOW, ALLOW],
      ['refresh', Action.Update, ResourceType.Session, deny('NotAuthenticated'), ALLOW, ALLOW],
      ['logout', Action.Delete, ResourceType.Session, deny('NotAuthenticated'), ALLOW, ALLOW],
      ['create user', Action.Create, ResourceType.User, ALLOW, ALLOW, ALLOW],
      ['read own user', Action.Read, ResourceType.User, deny('NotAuthenticated'), ALLOW, ALLOW],
      ['read categories', Action.Read, ResourceType.Category, ALLOW, ALLOW, ALLOW],
      ['read products', Action.Read, ResourceType.Product, ALLOW, ALLOW, ALLOW],
      ['read product reviews', Action.Read, ResourceType.ProductReviews, ALLOW, ALLOW, ALLOW],
      ['create product', Action.Create, ResourceType.Product, deny('NotAuthenticated'), deny('NotSeller'), ALLOW],
    ];

    for (const [name, action, type, anonymous, authenticated, sellerDecision] of rows) {
      it(`should decide "${name}" for every tier`, () => {
        expect(evaluate(ANONYMOUS, action, type)).toEqual(anonymous);
        expect(evaluate(buyer, action, type)).toEqual(authenticated);
        expect(evaluate(seller, action, type)).toEqual(sellerDecision);
      });
    }

    it('should decide "update product" for every tier', () => {
      const product = { ownerId: 3 };
      expect(evaluate(ANONYMOUS, Action.Update, ResourceType.Product, product)).toEqual(
        deny('NotAuthenticated')
      );
      expect(evaluate(buyer, Action.Update, ResourceType.Product, product)).toEqual(
        deny('NotSeller')
      );
      expect(evaluate(seller, Action.Update, ResourceType.Product, product)).toEqual(ALLOW);
    });
  });

  describe('unsupported combinations', () => {
    const unsupported: Array<[Action, ResourceType]> = [
      [Action.Create, ResourceType.Category],
      [Action.Update, ResourceType.Category],
      [Action.Delete, ResourceType.Category],
      [Action.Delete, ResourceType.Product],
      [Action.Create, ResourceType.ProductReviews],
      [Action.Update, ResourceType.ProductReviews],
      [Action.Delete, ResourceType.ProductReviews],
      [Action.Update, ResourceType.User],
      [Action.Delete, ResourceType.User],
      [Action.Read, ResourceType.Session],
    ];

    for (const [action, type] of unsupported) {
      it(`should deny ${action} on ${type} as Unsupported for every caller`, () => {
        for (const caller of [ANONYMOUS, buyer, seller]) {
          expect(evaluate(caller, action, type)).toEqual(deny('Unsupported'));
        }
      });
    }
  });

  describe('ownership', () => {
    it('should allow only the owning seller to update a product', () => {
      for (const ownerId of [1, 3, 4, 250]) {
        const product = { ownerId };
        const owner: Caller = { kind: 'user', id: ownerId, isSeller: true };
        const stranger: Caller = { kind: 'user', id: ownerId + 1, isSeller: true };

        expect(evaluate(owner, Action.Update, ResourceType.Product, product)).toEqual(ALLOW);
        expect(evaluate(stranger, Action.Update, ResourceType.Product, product)).toEqual(
          deny('NotOwner')
        );
      }
    });

    it('should check the seller role before ownership', () => {
      const ownProduct = { ownerId: 7 };
      expect(evaluate(buyer, Action.Update, ResourceType.Product, ownProduct)).toEqual(
        deny('NotSeller')
      );
    });

    it('should deny a product update with no product to compare against', () => {
      expect(evaluate(seller, Action.Update, ResourceType.Product)).toEqual(deny('NotOwner'));
      expect(evaluate(seller, Action.Update, ResourceType.Product, null)).toEqual(
        deny('NotOwner')
      );
      expect(evaluate(seller, Action.Update, ResourceType.Product, { ownerId: null })).toEqual(
        deny('NotOwner')
      );
    });

    it("should deny refreshing or revoking another user's session", () => {
      const session = { ownerId: 99 };
      expect(evaluate(buyer, Action.Update, ResourceType.Session, session)).toEqual(
        deny('NotOwner')
      );
      expect(evaluate(seller, Action.Delete, ResourceType.Session, session)).toEqual(
        deny('NotOwner')
      );
      expect(evaluate(buyer, Action.Update, ResourceType.Session, { ownerId: 7 })).toEqual(ALLOW);
    });

    it("should deny reading another user's account", () => {
      expect(evaluate(buyer, Action.Read, ResourceType.User, { ownerId: 8 })).toEqual(
        deny('NotOwner')
      );
      expect(evaluate(buyer, Action.Read, ResourceType.User, { ownerId: 7 })).toEqual(ALLOW);
    });

    it('should ignore ownership on public reads', () => {
      expect(evaluate(ANONYMOUS, Action.Read, ResourceType.Product, { ownerId: 3 })).toEqual(ALLOW);
      expect(evaluate(otherSeller, Action.Read, ResourceType.Product, { ownerId: 3 })).toEqual(
        ALLOW
      );
    });
  });

  describe('scenarios', () => {
    it('should allow an anonymous caller to read categories', () => {
      expect(evaluate(ANONYMOUS, Action.Read, ResourceType.Category)).toEqual(ALLOW);
    });

    it('should refuse product creation to a non-seller', () => {
      const caller: Caller = { kind: 'user', id: 7, isSeller: false };
      expect(evaluate(caller, Action.Create, ResourceType.Product)).toEqual(deny('NotSeller'));
    });

    it('should let seller 3 update product 9 they own, but not one owned by 4', () => {
      const caller: Caller = { kind: 'user', id: 3, isSeller: true };
      expect(evaluate(caller, Action.Update, ResourceType.Product, { ownerId: 3 })).toEqual(ALLOW);
      expect(evaluate(caller, Action.Update, ResourceType.Product, { ownerId: 4 })).toEqual(
        deny('NotOwner')
      );
    });
  });

  describe('purity', () => {
    it('should return identical decisions for identical inputs', () => {
      const product = { ownerId: 4 };
      const first = evaluate(seller, Action.Update, ResourceType.Product, product);
      const second = evaluate(seller, Action.Update, ResourceType.Product, product);
      expect(second).toEqual(first);
    });

    it('should not mutate the caller or the resource', () => {
      const caller = Object.freeze({ kind: 'user' as const, id: 3, isSeller: true });
      const product = Object.freeze({ ownerId: 3 });

      expect(() => evaluate(caller, Action.Update, ResourceType.Product, product)).not.toThrow();
      expect(caller).toEqual({ kind: 'user', id: 3, isSeller: true });
      expect(product).toEqual({ ownerId: 3 });
    });
  });

  describe('callerFromUser()', () => {
    it('should map the seller role to the seller capability', () => {
      expect(callerFromUser({ id: 3, role: 'seller' })).toEqual({
        kind: 'user',
        id: 3,
        isSeller: true,
      });
      expect(callerFromUser({ id: 7, role: 'buyer' })).toEqual({
        kind: 'user',
        id: 7,
        isSeller: false,
      });
    });
  });
});
