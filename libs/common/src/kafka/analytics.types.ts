/**
 * Wire shapes shared by Kafka topics and the Elasticsearch snapshot index.
 */

export interface ZoneOccupancyDocument {
  zone_id: string;
  name: string;
  type: string;
  count: number;
  rolling_average: number;
  capacity: number;
  occupancy_percent: number;
}

/** Snapshot document published on the analytics topic and indexed into Elasticsearch. */
export interface AnalyticsSnapshotDocument {
  timestamp: string;
  mode: string;
  current_count: number;
  total_entries: number;
  total_exits: number;
  unique_visitors: number;
  fps: number;
  zones: ZoneOccupancyDocument[];
  crowd_mode: boolean;
  crowd_confidence: number;
  density_band: string;
  estimated_count: number;
}

export interface KafkaMessageMetadata {
  topic: string;
  partition: number;
  offset: string;
  key: string | null;
  timestamp: string | null;
}

export type DetectionFrameHandler = (payload: unknown, metadata: KafkaMessageMetadata) => Promise<void>;
