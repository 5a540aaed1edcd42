import { MongoClient } from "mongodb";

export type MongoConnectionOptions = {
  mongoUri: string;
  serverSelectionTimeoutMs: number;
};

export const createMongoClient = async (options: MongoConnectionOptions): Promise<MongoClient> => {
  const client = new MongoClient(options.mongoUri, {
    appName: "build-timeouts",
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMs
  });
  await client.connect();
  return client;
};
