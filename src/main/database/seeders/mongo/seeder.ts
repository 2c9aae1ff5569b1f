import { seedDefaultAdmin } from '../common/userSeeder';

export const seedDatabase = async () => {
  await seedDefaultAdmin();
};
