import { describe, it, expect } from 'vitest';
import { eventCategory, isGoalEvent, isValidEventType, normalizeEventType } from '../../src/models/eventTypes.js';

describe('eventTypes', () => {
  describe('normalizeEventType', () => {
    it('should trim and lowercase', () => {
      expect(normalizeEventType('  Yellow_Card ')).toBe('yellow_card');
      expect(normalizeEventType('GOAL')).toBe('goal');
    });
  });

  describe('isValidEventType', () => {
    it('should accept snake_case identifiers', () => {
      expect(isValidEventType('goal')).toBe(true);
      expect(isValidEventType('shot_on_target')).toBe(true);
      expect(isValidEventType('var_check_2')).toBe(true);
    });

    it('should reject empty, oversized and punctuated types', () => {
      expect(isValidEventType('')).toBe(false);
      expect(isValidEventType('a'.repeat(51))).toBe(false);
      expect(isValidEventType('free kick')).toBe(false);
      expect(isValidEventType('Goal')).toBe(false);
    });

    it('should accept a type at the column width', () => {
      expect(isValidEventType('a'.repeat(50))).toBe(true);
    });
  });

  describe('eventCategory', () => {
    it('should map known types to their category', () => {
      expect(eventCategory('own_goal')).toBe('goal');
      expect(eventCategory('second_yellow_card')).toBe('card');
      expect(eventCategory('substitution_on')).toBe('substitution');
      expect(eventCategory('shot_woodwork')).toBe('shot');
      expect(eventCategory('half_time')).toBe('match_state');
    });

    it('should fall back to other', () => {
      expect(eventCategory('corner')).toBe('other');
      expect(eventCategory('constructor')).toBe('other');
    });
  });

  describe('isGoalEvent', () => {
    it('should be true for goal-category types only', () => {
      expect(isGoalEvent('goal')).toBe(true);
      expect(isGoalEvent('penalty_goal')).toBe(true);
      expect(isGoalEvent('yellow_card')).toBe(false);
    });
  });
});
