import { connectDatabase, disconnectDatabase } from '../src/main/config/mongoose';
import { seedDatabase } from '../src/main/database/seeders/mongo/seeder';

await connectDatabase();
await seedDatabase();
await disconnectDatabase();
