import { MongoClient } from "mongodb";

export const createMongoClient = (mongoUri: string, timeoutMs: number): MongoClient =>
  new MongoClient(mongoUri, {
    serverSelectionTimeoutMS: timeoutMs,
    connectTimeoutMS: timeoutMs
  });
