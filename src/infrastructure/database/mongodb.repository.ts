import { Db, Collection, type Document } from "mongodb";

interface CounterDocument {
  _id: string;
  seq: number;
}

/**
 * Base for collections keyed by a numeric, monotonically increasing `id`.
 * Ids come from a per-collection counter document incremented atomically.
 */
export abstract class MongoDBRepository<T extends Document> {
  protected db: Db;
  protected collection: Collection<T>;
  private counters: Collection<CounterDocument>;

  constructor(db: Db, protected readonly collectionName: string) {
    this.db = db;
    this.collection = db.collection<T>(collectionName);
    this.counters = db.collection<CounterDocument>("counters");
    // Create indexes for efficient queries (fire and forget)
    this.ensureIndexes().catch((error) => {
      console.error(`[MongoDBRepository] Failed to create indexes for ${collectionName}:`, error);
    });
  }

  protected async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ id: 1 }, { unique: true });
  }

  protected async nextId(): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: this.collectionName },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: "after" }
    );
    if (!counter) {
      throw new Error(`Failed to allocate an id for ${this.collectionName}`);
    }
    return counter.seq;
  }
}
