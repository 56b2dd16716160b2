import { describe, it, expect } from 'vitest';
import { MaintenanceValidationError } from '../maintenance_errors.js';
import { CreateRequestInputSchema, parseInput, ThresholdConfigInputSchema } from '../maintenance_schemas.js';

describe('parseInput', () => {
  it('should apply defaults and trim text', () => {
    const parsed = parseInput(
      CreateRequestInputSchema,
      {
        hostelId: 'hostel-1',
        title: '  Broken window  ',
        description: 'Window latch in dorm B snapped',
        category: 'carpentry',
        requestedBy: 'staff-1',
      },
      'maintenance request'
    );

    expect(parsed.title).toBe('Broken window');
    expect(parsed.priority).toBe('medium');
    expect(parsed.issueType).toBe('routine');
  });

  it('should summarise every issue with its path', () => {
    let caught: unknown;
    try {
      parseInput(
        CreateRequestInputSchema,
        { hostelId: 'hostel-1', title: 'Tap', description: 'short', category: 'plumbing', requestedBy: 'staff-1' },
        'maintenance request'
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MaintenanceValidationError);
    if (caught instanceof MaintenanceValidationError) {
      expect(caught.code).toBe('VALIDATION_FAILED');
      expect(caught.issues.map((issue) => issue.path.join('.'))).toEqual(['description']);
    }
  });

  it('should report cross-field threshold rules', () => {
    expect(() =>
      parseInput(
        ThresholdConfigInputSchema,
        { hostelId: 'hostel-1', autoApproveBelow: 2000, supervisorLimit: 1000, adminRequiredAbove: 5000 },
        'approval thresholds'
      )
    ).toThrow('Invalid approval thresholds: autoApproveBelow: autoApproveBelow must not exceed supervisorLimit');
  });
});
