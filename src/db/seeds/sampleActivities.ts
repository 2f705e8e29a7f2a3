import { NewActivity } from '../store';

export interface SeedActivity extends NewActivity {
  participants: string[];
}

export const sampleActivities: SeedActivity[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
];

export default sampleActivities;
