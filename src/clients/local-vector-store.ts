import fs from "node:fs/promises";
import path from "node:path";
import type {
  PayloadCondition,
  PointFilter,
  ScrolledPoint,
  VectorCollectionClient,
  VectorPoint
} from "../modules/indexing/chunk-store.js";

interface StoredCollection {
  size: number;
  points: VectorPoint[];
}

interface StoreShape {
  collections: Record<string, StoredCollection>;
}

export const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export const resolveStorePath = (configured: string | undefined, cwd = process.cwd()): string => {
  const relative = configured?.trim() || DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative) ? relative : path.resolve(cwd, relative);
};

const matchesCondition = (payload: Record<string, unknown>, condition: PayloadCondition): boolean =>
  payload[condition.key] === condition.match.value;

const matchesFilter = (payload: Record<string, unknown>, filter?: PointFilter): boolean => {
  const must = filter?.must ?? [];
  const mustNot = filter?.must_not ?? [];
  return (
    must.every((condition) => matchesCondition(payload, condition)) &&
    !mustNot.some((condition) => matchesCondition(payload, condition))
  );
};

const isStoreShape = (value: unknown): value is StoreShape =>
  typeof value === "object" && value !== null && "collections" in value && typeof value.collections === "object";

export interface LocalVectorStoreClient extends VectorCollectionClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
}

export interface LocalVectorStoreOptions {
  /** JSON file to persist to; `null` keeps everything in memory. */
  filePath: string | null;
}

/**
 * File-backed (or purely in-memory) stand-in for the Qdrant client, covering
 * the collection, upsert, filtered delete and scroll calls the chunk store makes.
 */
export function createLocalVectorStoreClient(options: LocalVectorStoreOptions): LocalVectorStoreClient {
  const { filePath } = options;
  let memory: StoreShape = { collections: {} };

  const readStore = async (): Promise<StoreShape> => {
    if (filePath === null) {
      return memory;
    }
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
      return isStoreShape(parsed) ? parsed : { collections: {} };
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { collections: {} };
      }
      throw error;
    }
  };

  const writeStore = async (store: StoreShape): Promise<void> => {
    if (filePath === null) {
      memory = store;
      return;
    }
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(store), "utf8");
  };

  const requireCollection = (store: StoreShape, name: string): StoredCollection => {
    const collection = store.collections[name];
    if (!collection) {
      throw new Error(`Collection ${name} does not exist.`);
    }
    return collection;
  };

  return {
    async getCollections() {
      const store = await readStore();
      return { collections: Object.keys(store.collections).map((name) => ({ name })) };
    },

    async collectionExists(name) {
      const store = await readStore();
      return { exists: store.collections[name] !== undefined };
    },

    async createCollection(name, args) {
      const store = await readStore();
      if (store.collections[name]) {
        return false;
      }
      store.collections[name] = { size: args.vectors.size, points: [] };
      await writeStore(store);
      return true;
    },

    async upsert(name, args) {
      const store = await readStore();
      const collection = requireCollection(store, name);
      const byId = new Map(collection.points.map((point) => [point.id, point]));
      for (const point of args.points) {
        if (point.vector.length !== collection.size) {
          throw new Error(`Vector dimension ${point.vector.length} does not match collection size ${collection.size}.`);
        }
        byId.set(point.id, { id: point.id, vector: [...point.vector], payload: { ...point.payload } });
      }
      collection.points = [...byId.values()];
      await writeStore(store);
      return { status: "completed" };
    },

    async delete(name, args) {
      const store = await readStore();
      const collection = store.collections[name];
      if (collection) {
        collection.points = collection.points.filter((point) => !matchesFilter(point.payload, args.filter));
        await writeStore(store);
      }
      return { status: "completed" };
    },

    async scroll(name, args) {
      const store = await readStore();
      const matching = requireCollection(store, name).points.filter((point) => matchesFilter(point.payload, args.filter));
      const start = typeof args.offset === "number" ? args.offset : 0;
      const limit = args.limit ?? 10;
      const page = matching.slice(start, start + limit);
      const points: ScrolledPoint[] = page.map((point) => ({
        id: point.id,
        payload: args.with_payload === false ? null : { ...point.payload },
        vector: args.with_vector ? [...point.vector] : undefined
      }));
      return { points, next_page_offset: start + limit < matching.length ? start + limit : null };
    }
  };
}
