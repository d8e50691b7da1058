export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  apiPrefix: process.env.API_PREFIX ?? 'api',
  cors: {
    origin: process.env.CORS_ORIGIN
      ? process.env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : ['http://localhost:3000', 'http://localhost:5173'],
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },
  logging: {
    level: process.env.LOG_LEVEL ?? 'log',
  },
  kafka: {
    enabled: process.env.KAFKA_ENABLED !== 'false',
    broker: process.env.KAFKA_BROKER ?? 'localhost:9092',
    clientId: process.env.KAFKA_CLIENT_ID ?? 'footfall-consumer',
    groupId: process.env.KAFKA_GROUP_ID ?? 'footfall-pipeline',
    connectionTimeout: parseInt(process.env.KAFKA_CONNECTION_TIMEOUT ?? '3000', 10),
    requestTimeout: parseInt(process.env.KAFKA_REQUEST_TIMEOUT ?? '30000', 10),
    retry: {
      retries: parseInt(process.env.KAFKA_RETRIES ?? '5', 10),
      initialRetryTime: parseInt(process.env.KAFKA_INITIAL_RETRY_TIME ?? '100', 10),
      multiplier: parseFloat(process.env.KAFKA_RETRY_MULTIPLIER ?? '2'),
    },
    topics: {
      detections: process.env.KAFKA_TOPIC_DETECTIONS ?? 'footfall.detections.v1',
      analytics: process.env.KAFKA_TOPIC_ANALYTICS ?? 'footfall.analytics.v1',
    },
    producer: {
      clientId: process.env.KAFKA_PRODUCER_CLIENT_ID ?? 'footfall-producer',
    },
  },
  elasticsearch: {
    enabled: process.env.ELASTICSEARCH_ENABLED !== 'false',
    node: process.env.ELASTICSEARCH_NODE ?? 'http://localhost:9200',
    username: process.env.ELASTICSEARCH_USERNAME ?? 'elastic',
    password: process.env.ELASTICSEARCH_PASSWORD ?? 'changeme',
    index: process.env.ELASTICSEARCH_INDEX ?? 'footfall-analytics',
    requestTimeout: parseInt(process.env.ELASTICSEARCH_REQUEST_TIMEOUT ?? '30000', 10),
  },
  pipeline: {
    publishEnabled: process.env.PIPELINE_PUBLISH_ENABLED !== 'false',
    publishIntervalMs: parseInt(process.env.PIPELINE_PUBLISH_INTERVAL_MS ?? '1000', 10),
    maxTrackableDetections: parseInt(process.env.PIPELINE_MAX_TRACKABLE_DETECTIONS ?? '50', 10),
    trackThresh: parseFloat(process.env.PIPELINE_TRACK_THRESH ?? '0.5'),
    matchThresh: parseFloat(process.env.PIPELINE_MATCH_THRESH ?? '0.8'),
    trackBuffer: parseInt(process.env.PIPELINE_TRACK_BUFFER ?? '30', 10),
    crowdModeThreshold: parseInt(process.env.PIPELINE_CROWD_MODE_THRESHOLD ?? '20', 10),
    highDensityThreshold: parseFloat(process.env.PIPELINE_HIGH_DENSITY_THRESHOLD ?? '0.7'),
  },
  calibration: {
    file: process.env.CALIBRATION_FILE ?? 'config/calibration.json',
    persist: process.env.CALIBRATION_PERSIST === 'true',
  },
});
