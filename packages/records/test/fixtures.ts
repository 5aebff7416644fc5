import type { Result } from '../src/result.js';
import type { ValidationErrorReport } from '../src/report.js';

type Raw = Record<string, unknown>;

export function station(overrides: Raw = {}): Raw {
  return {
    station_id: 'ISS001',
    name: 'International Space Station',
    crew_size: 6,
    power_level: 85.5,
    oxygen_level: 92.3,
    last_maintenance: '2024-02-01T10:30:00',
    is_operational: true,
    notes: 'All systems nominal.',
    ...overrides,
  };
}

export function contactReport(overrides: Raw = {}): Raw {
  return {
    contact_id: 'AC_2024_001',
    timestamp: '2024-06-01T14:30:00',
    location: 'Area 51, Nevada',
    contact_type: 'radio',
    signal_strength: 8.5,
    duration_minutes: 45,
    witness_count: 5,
    message_received: 'Greetings from Zeta Reticuli',
    is_verified: false,
    ...overrides,
  };
}

export function commander(overrides: Raw = {}): Raw {
  return {
    member_id: 'C03',
    name: 'Sarah Connor',
    rank: 'commander',
    age: 45,
    specialization: 'mission command',
    years_experience: 20,
    is_active: true,
    ...overrides,
  };
}

export function engineer(overrides: Raw = {}): Raw {
  return {
    member_id: 'C04',
    name: 'John Smith',
    rank: 'officer',
    age: 29,
    specialization: 'engineering',
    years_experience: 7,
    is_active: true,
    ...overrides,
  };
}

export function cadet(memberId: string, overrides: Raw = {}): Raw {
  return {
    member_id: memberId,
    name: 'Rookie Pilot',
    rank: 'cadet',
    age: 22,
    specialization: 'navigation',
    years_experience: 2,
    ...overrides,
  };
}

export function mission(overrides: Raw = {}): Raw {
  return {
    mission_id: 'M2026_OK',
    mission_name: 'Mars Exploration Mission',
    destination: 'Mars',
    launch_date: '2026-03-01T09:00:00Z',
    duration_days: 900,
    crew: [commander(), engineer()],
    budget_millions: 2500.0,
    ...overrides,
  };
}

export function expectOk<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected validation to pass, got:\n${result.error.toString()}`);
  }
  return result.value;
}

export function expectError<T>(result: Result<T>): ValidationErrorReport {
  if (result.ok) {
    throw new Error('Expected validation to fail');
  }
  return result.error;
}
