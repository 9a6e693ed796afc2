import { MongoClient, type AnyBulkWriteOperation, type Collection } from "mongodb";
import { isPoiSource, POI_PRIORITIES, type Poi, type PoiPriority, type PoiSource } from "../../core/poi/poi.types";
import { parsePoiCategory } from "../../core/poi/category";
import type { PoiRepository, PoiStats } from "../../ports/PoiRepository";
import { mongoIndexes } from "./mongo.indexes";

export type PoiDoc = {
  _id: string;
  name: string;
  description?: string;
  location: { type: "Point"; coordinates: [number, number] }; // [lon, lat]
  category: string;
  notificationRadius: number;
  priority: number;
  visited: boolean;
  lastNotifiedAtMillis?: number;
  createdAt: Date;
  source: string;
  tags: Record<string, string>;
  isActive: boolean;
};

export const toPoiDoc = (poi: Poi): PoiDoc => {
  const doc: PoiDoc = {
    _id: poi.id,
    name: poi.name,
    location: { type: "Point", coordinates: [poi.position.longitude, poi.position.latitude] },
    category: poi.category,
    notificationRadius: poi.notificationRadius,
    priority: poi.priority,
    visited: poi.visited,
    createdAt: poi.createdAt,
    source: poi.source,
    tags: poi.tags,
    isActive: poi.isActive
  };
  if (poi.description != null) doc.description = poi.description;
  if (poi.lastNotifiedAtMillis != null) doc.lastNotifiedAtMillis = poi.lastNotifiedAtMillis;
  return doc;
};

const toPriority = (value: number): PoiPriority => POI_PRIORITIES.find((p) => p === value) ?? 0;

const toSource = (value: string): PoiSource => (isPoiSource(value) ? value : "manual");

export const fromPoiDoc = (doc: PoiDoc): Poi => {
  const [longitude, latitude] = doc.location.coordinates;
  const poi: Poi = {
    id: doc._id,
    name: doc.name,
    position: { latitude, longitude },
    category: parsePoiCategory(doc.category),
    notificationRadius: doc.notificationRadius,
    priority: toPriority(doc.priority),
    visited: doc.visited,
    createdAt: doc.createdAt,
    source: toSource(doc.source),
    tags: doc.tags,
    isActive: doc.isActive
  };
  if (doc.description != null) poi.description = doc.description;
  if (doc.lastNotifiedAtMillis != null) poi.lastNotifiedAtMillis = doc.lastNotifiedAtMillis;
  return poi;
};

/**
 * Keeps the last POI seen for each id inside one batch.
 */
export const dedupePoisById = (pois: Poi[]): Poi[] => {
  const byId = new Map<string, Poi>();
  for (const poi of pois) {
    byId.set(poi.id, poi);
  }
  return Array.from(byId.values());
};

/**
 * Mongo repository. POIs are upserted by id, so re-importing a source with
 * deterministic ids replaces documents instead of duplicating them.
 */
export class MongoPoiRepository implements PoiRepository {
  private client?: MongoClient;
  private connecting?: Promise<Collection<PoiDoc>>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "survey",
    private readonly collectionName = "pois"
  ) {}

  // one connection per repository, however many callers race for it
  private getCollection(): Promise<Collection<PoiDoc>> {
    if (!this.connecting) {
      this.connecting = this.connect().catch((err: unknown) => {
        this.connecting = undefined;
        throw err;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<Collection<PoiDoc>> {
    const client = new MongoClient(this.mongoUri);
    this.client = client;
    await client.connect();

    const col = client.db(this.dbName).collection<PoiDoc>(this.collectionName);
    for (const idx of mongoIndexes.poiCollection) {
      await col.createIndex(idx.keys, idx.options);
    }
    return col;
  }

  async insert(poi: Poi): Promise<void> {
    await this.insertMany([poi]);
  }

  async insertMany(pois: Poi[]): Promise<{ upserted: number; modified: number }> {
    if (pois.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const ops: AnyBulkWriteOperation<PoiDoc>[] = dedupePoisById(pois).map((poi) => {
      const { _id, ...replacement } = toPoiDoc(poi);
      return {
        replaceOne: {
          filter: { _id },
          replacement,
          upsert: true
        }
      };
    });

    const res = await col.bulkWrite(ops, { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }

  async queryAll(): Promise<Poi[]> {
    const col = await this.getCollection();
    const docs = await col.find({}).toArray();
    return docs.map(fromPoiDoc);
  }

  async deleteAllFromSource(source: PoiSource, keepIds: string[] = []): Promise<number> {
    const col = await this.getCollection();
    const res = await col.deleteMany(keepIds.length > 0 ? { source, _id: { $nin: keepIds } } : { source });
    return res.deletedCount ?? 0;
  }

  async stats(): Promise<PoiStats> {
    const col = await this.getCollection();
    const [total, visited] = await Promise.all([col.countDocuments({}), col.countDocuments({ visited: true })]);
    return { total, visited };
  }

  async markVisited(poiId: string): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne({ _id: poiId }, { $set: { visited: true } });
  }

  async updateLastNotifiedAt(poiId: string, atMillis: number): Promise<void> {
    const col = await this.getCollection();
    // only move forward: a late write for an older fix must not rewind the timestamp
    await col.updateOne(
      { _id: poiId, $or: [{ lastNotifiedAtMillis: { $exists: false } }, { lastNotifiedAtMillis: { $lte: atMillis } }] },
      { $set: { lastNotifiedAtMillis: atMillis } }
    );
  }

  async clearSurveyState(): Promise<void> {
    const col = await this.getCollection();
    await col.updateMany({}, { $set: { visited: false }, $unset: { lastNotifiedAtMillis: "" } });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.connecting = undefined;
    await client?.close();
  }
}
