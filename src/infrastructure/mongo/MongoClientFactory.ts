import { MongoClient } from "mongodb";

// Optional fields are left off documents instead of being stored as null.
export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { ignoreUndefined: true });
  await client.connect();
  return client;
};
