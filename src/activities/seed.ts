// --- Seed roster: the activities on offer at process start ---

import type { ActivityMap } from './types.js';

const seed: ActivityMap = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  'Basketball Team': {
    description: 'Practice drills and compete in inter-school basketball games',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 6:00 PM',
    max_participants: 15,
    participants: ['james@mergington.edu', 'lucas@mergington.edu'],
  },
  'Tennis Club': {
    description: 'Improve your serve and volley with weekly matches',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    max_participants: 10,
    participants: ['ava@mergington.edu'],
  },
  'Art Studio': {
    description: 'Explore painting, drawing, and mixed media projects',
    schedule: 'Wednesdays, 3:30 PM - 5:00 PM',
    max_participants: 18,
    participants: ['mia@mergington.edu', 'amelia@mergington.edu'],
  },
  'Drama Club': {
    description: 'Rehearse and perform plays for the school community',
    schedule: 'Thursdays, 3:30 PM - 5:30 PM',
    max_participants: 25,
    participants: ['harper@mergington.edu'],
  },
  'Debate Team': {
    description: 'Sharpen public speaking and argumentation skills',
    schedule: 'Mondays, 3:30 PM - 5:00 PM',
    max_participants: 16,
    participants: ['ethan@mergington.edu', 'noah@mergington.edu'],
  },
  'Robotics Club': {
    description: 'Design, build, and program robots for competitions',
    schedule: 'Saturdays, 10:00 AM - 1:00 PM',
    max_participants: 14,
    participants: ['liam@mergington.edu'],
  },
};

/**
 * Fresh copy of the seed roster. Each call returns independent participant
 * arrays, so every directory built from it starts from the same state.
 */
export function seedActivities(): ActivityMap {
  const copy: ActivityMap = {};
  for (const [name, activity] of Object.entries(seed)) {
    copy[name] = { ...activity, participants: [...activity.participants] };
  }
  return copy;
}
