import { describe, it, expect } from 'vitest';
import {
  compareApprovalLevels,
  isHigherApprovalLevel,
  requiredApprovalLevel,
} from '../threshold_policy.js';

describe('requiredApprovalLevel', () => {
  describe('with default thresholds', () => {
    it('should auto-approve costs below the auto threshold', () => {
      expect(requiredApprovalLevel(null, 0)).toBe('auto');
      expect(requiredApprovalLevel(null, 999.99)).toBe('auto');
    });

    it('should treat a missing estimate as zero', () => {
      expect(requiredApprovalLevel(null, null)).toBe('auto');
    });

    it('should require a supervisor from the auto threshold up to the supervisor limit', () => {
      expect(requiredApprovalLevel(null, 1000)).toBe('supervisor');
      expect(requiredApprovalLevel(null, 4999.99)).toBe('supervisor');
    });

    it('should require an admin at and above the admin threshold', () => {
      expect(requiredApprovalLevel(null, 5000)).toBe('admin');
      expect(requiredApprovalLevel(null, 250000)).toBe('admin');
    });
  });

  describe('with a hostel configuration', () => {
    const config = {
      autoApproveBelow: 500,
      supervisorLimit: 3000,
      adminRequiredAbove: 8000,
      autoApproveEnabled: true,
    };

    it('should keep costs between the supervisor limit and the admin threshold at supervisor', () => {
      expect(requiredApprovalLevel(config, 3000)).toBe('supervisor');
      expect(requiredApprovalLevel(config, 7999.99)).toBe('supervisor');
      expect(requiredApprovalLevel(config, 8000)).toBe('admin');
    });

    it('should never auto-approve when auto-approval is disabled', () => {
      const strict = { ...config, autoApproveEnabled: false };
      expect(requiredApprovalLevel(strict, 0)).toBe('supervisor');
      expect(requiredApprovalLevel(strict, 499)).toBe('supervisor');
    });
  });
});

describe('approval level ordering', () => {
  it('should rank auto below supervisor below admin', () => {
    expect(compareApprovalLevels('auto', 'supervisor')).toBeLessThan(0);
    expect(compareApprovalLevels('admin', 'supervisor')).toBeGreaterThan(0);
    expect(compareApprovalLevels('admin', 'admin')).toBe(0);
  });

  it('should only report strictly higher levels as higher', () => {
    expect(isHigherApprovalLevel('admin', 'supervisor')).toBe(true);
    expect(isHigherApprovalLevel('supervisor', 'supervisor')).toBe(false);
    expect(isHigherApprovalLevel('auto', 'admin')).toBe(false);
  });
});
