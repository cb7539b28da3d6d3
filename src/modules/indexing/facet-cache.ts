import { METADATA_FIELDS, readMetadataValues, type MetadataField, type MetadataRecord } from "../documents/types.js";
import { foldText } from "../extraction/text-normalizer.js";

export type FacetSnapshot = Record<MetadataField, string[]>;

export interface FacetValueCount {
  value: string;
  documentCount: number;
}

interface FacetEntry {
  /** Spelling of the first document that introduced the value. */
  value: string;
  documents: Set<string>;
}

const collator = new Intl.Collator("az");

/**
 * Distinct metadata values per field, each backed by the ids of the documents
 * that carry it. A value disappears with its last backing document.
 */
export class FacetCache {
  private fields = new Map<MetadataField, Map<string, FacetEntry>>();
  private contributions = new Map<string, Array<{ field: MetadataField; key: string }>>();

  update(documentId: string, metadata: MetadataRecord): void {
    this.remove(documentId);
    const contributed: Array<{ field: MetadataField; key: string }> = [];

    for (const field of METADATA_FIELDS) {
      for (const value of readMetadataValues(metadata, field)) {
        const key = foldText(value);
        if (key.length === 0 || contributed.some((entry) => entry.field === field && entry.key === key)) {
          continue;
        }
        const values = this.fields.get(field) ?? new Map<string, FacetEntry>();
        this.fields.set(field, values);
        const entry = values.get(key) ?? { value, documents: new Set<string>() };
        entry.documents.add(documentId);
        values.set(key, entry);
        contributed.push({ field, key });
      }
    }

    this.contributions.set(documentId, contributed);
  }

  remove(documentId: string): void {
    const contributed = this.contributions.get(documentId);
    if (!contributed) {
      return;
    }
    for (const { field, key } of contributed) {
      const values = this.fields.get(field);
      const entry = values?.get(key);
      if (!values || !entry) {
        continue;
      }
      entry.documents.delete(documentId);
      if (entry.documents.size === 0) {
        values.delete(key);
      }
    }
    this.contributions.delete(documentId);
  }

  /** Drops everything and rebuilds from the given documents. */
  rebuild(documents: Iterable<{ documentId: string; metadata: MetadataRecord }>): void {
    this.fields = new Map();
    this.contributions = new Map();
    for (const document of documents) {
      this.update(document.documentId, document.metadata);
    }
  }

  snapshot(): FacetSnapshot {
    const list = (field: MetadataField): string[] => this.values(field).map((entry) => entry.value);
    return {
      courtName: list("courtName"),
      caseNumber: list("caseNumber"),
      judge: list("judge"),
      clerk: list("clerk"),
      caseType: list("caseType"),
      district: list("district"),
      decisionType: list("decisionType"),
      year: list("year"),
      decisionDate: list("decisionDate"),
      parties: list("parties")
    };
  }

  values(field: MetadataField): FacetValueCount[] {
    return [...(this.fields.get(field)?.values() ?? [])]
      .map((entry) => ({ value: entry.value, documentCount: entry.documents.size }))
      .sort((left, right) => collator.compare(left.value, right.value));
  }

  /** Ids of documents carrying `value` for `field`, compared case-folded. */
  documentsWith(field: MetadataField, value: string): ReadonlySet<string> {
    return this.fields.get(field)?.get(foldText(value))?.documents ?? new Set<string>();
  }

  documentCount(): number {
    return this.contributions.size;
  }
}
