import { MongoClient, Db } from "mongodb";

/**
 * Owns one MongoClient. Created in index.ts and handed to whatever needs the database,
 * so there is no module-level connection state.
 */
export class MongoDBConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(
    private readonly uri: string,
    private readonly dbName: string
  ) {}

  async connect(): Promise<Db> {
    if (this.db) {
      return this.db;
    }

    try {
      const client = new MongoClient(this.uri);
      await client.connect();
      this.client = client;
      this.db = client.db(this.dbName);
      console.log(`Connected to MongoDB: ${this.dbName}`);
      return this.db;
    } catch (error) {
      console.error("Failed to connect to MongoDB:", error);
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      console.log("MongoDB connection closed");
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error("MongoDB not connected. Call connect() first.");
    }
    return this.db;
  }
}
