import { describe, it, expect } from 'vitest';
import { suggestAssignee, type BalancerCandidate } from '../assignment_balancer.js';

const candidate = (
  assigneeId: string,
  activeAssignments: number,
  outstandingHours: number,
  skills: string[] = []
): BalancerCandidate => ({ assigneeId, activeAssignments, outstandingHours, skills });

describe('suggestAssignee', () => {
  it('should pick the candidate with the fewest active assignments', () => {
    const pool = [candidate('tech-a', 3, 2), candidate('tech-b', 1, 10), candidate('tech-c', 2, 0)];
    expect(suggestAssignee(pool)?.assigneeId).toBe('tech-b');
  });

  it('should break ties on outstanding hours', () => {
    const pool = [candidate('tech-a', 1, 6), candidate('tech-b', 1, 2.5)];
    expect(suggestAssignee(pool)?.assigneeId).toBe('tech-b');
  });

  it('should break remaining ties on id', () => {
    const pool = [candidate('tech-c', 0, 0), candidate('tech-a', 0, 0), candidate('tech-b', 0, 0)];
    expect(suggestAssignee(pool)?.assigneeId).toBe('tech-a');
  });

  it('should only consider candidates holding every required skill', () => {
    const pool = [
      candidate('tech-a', 0, 0, ['plumbing']),
      candidate('tech-b', 4, 12, ['plumbing', 'electrical']),
    ];
    expect(suggestAssignee(pool, { requiredSkills: ['plumbing', 'electrical'] })?.assigneeId).toBe('tech-b');
  });

  it('should skip excluded candidates', () => {
    const pool = [candidate('tech-a', 0, 0), candidate('tech-b', 2, 0)];
    expect(suggestAssignee(pool, { exclude: ['tech-a'] })?.assigneeId).toBe('tech-b');
  });

  it('should return null when nobody qualifies', () => {
    expect(suggestAssignee([])).toBeNull();
    expect(suggestAssignee([candidate('tech-a', 0, 0)], { requiredSkills: ['hvac'] })).toBeNull();
  });

  it('should not reorder the caller array', () => {
    const pool = [candidate('tech-b', 1, 0), candidate('tech-a', 0, 0)];
    suggestAssignee(pool);
    expect(pool.map((entry) => entry.assigneeId)).toEqual(['tech-b', 'tech-a']);
  });
});
