export const SCHEMA_VERSION = 1;

export const CREATE_TABLES_SQL = `
  -- 1. run_log (created first: referenced by crawl_tasks)
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    started_at TEXT NOT NULL DEFAULT (datetime('now')),
    finished_at TEXT,
    status TEXT DEFAULT 'running',
    zones_attempted INTEGER DEFAULT 0,
    hotels_accepted INTEGER DEFAULT 0,
    zones_short INTEGER DEFAULT 0,
    errors TEXT,
    dry_run INTEGER DEFAULT 0
  );

  -- 2. hotels
  CREATE TABLE IF NOT EXISTS hotels (
    hotel_id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    address TEXT,
    city_code TEXT,
    latitude REAL,
    longitude REAL,
    star_level TEXT,
    rating_score REAL,
    review_count INTEGER,
    base_price INTEGER,
    region TEXT,
    business_zone TEXT,
    zone_code TEXT,
    price_level TEXT,
    fetched_tier TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_hotels_region ON hotels(region);
  CREATE INDEX IF NOT EXISTS idx_hotels_zone ON hotels(zone_code);
  CREATE INDEX IF NOT EXISTS idx_hotels_review_count ON hotels(review_count DESC);

  -- 3. reviews
  CREATE TABLE IF NOT EXISTS reviews (
    review_id TEXT PRIMARY KEY,
    hotel_id TEXT NOT NULL,
    author_handle TEXT,
    content TEXT NOT NULL,
    summary TEXT,
    score_clean REAL,
    score_location REAL,
    score_service REAL,
    score_value REAL,
    overall_score REAL,
    tags TEXT,
    has_image INTEGER DEFAULT 0,
    review_date TEXT,
    source_pool TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (hotel_id) REFERENCES hotels(hotel_id)
  );

  CREATE INDEX IF NOT EXISTS idx_reviews_hotel ON reviews(hotel_id);
  CREATE INDEX IF NOT EXISTS idx_reviews_pool ON reviews(source_pool);
  CREATE INDEX IF NOT EXISTS idx_reviews_date ON reviews(review_date DESC);

  -- 4. review_images
  CREATE TABLE IF NOT EXISTS review_images (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    review_id TEXT NOT NULL,
    image_url TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(review_id, image_url),
    FOREIGN KEY (review_id) REFERENCES reviews(review_id) ON DELETE CASCADE
  );

  -- 5. review_replies
  CREATE TABLE IF NOT EXISTS review_replies (
    review_id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    reply_date TEXT,
    FOREIGN KEY (review_id) REFERENCES reviews(review_id) ON DELETE CASCADE
  );

  -- 6. crawl_tasks
  CREATE TABLE IF NOT EXISTS crawl_tasks (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    region TEXT,
    zone_code TEXT,
    zone_name TEXT,
    tier_level TEXT,
    hotel_id TEXT,
    priority INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'pending',
    retry_count INTEGER NOT NULL DEFAULT 0,
    error_reason TEXT,
    items_crawled INTEGER NOT NULL DEFAULT 0,
    items_target INTEGER,
    created_at TEXT NOT NULL,
    started_at TEXT,
    completed_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_queue
    ON crawl_tasks(status, kind, priority DESC, created_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_hotel ON crawl_tasks(hotel_id);

  -- 7. crawl_logs
  CREATE TABLE IF NOT EXISTS crawl_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT,
    level TEXT NOT NULL,
    event TEXT NOT NULL,
    from_status TEXT,
    to_status TEXT,
    message TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (task_id) REFERENCES crawl_tasks(id)
  );

  CREATE INDEX IF NOT EXISTS idx_crawl_logs_task ON crawl_logs(task_id);
`;

export const CREATE_VIEWS_SQL = `
  CREATE VIEW IF NOT EXISTS v_hotel_review_stats AS
  SELECT
    h.hotel_id,
    h.name,
    h.region,
    COALESCE(h.price_level, h.fetched_tier) AS price_level,
    h.review_count,
    COUNT(r.review_id) AS reviews_stored,
    SUM(CASE WHEN r.source_pool = 'negative' THEN 1 ELSE 0 END) AS negative_count,
    SUM(CASE WHEN r.source_pool = 'evidence' THEN 1 ELSE 0 END) AS evidence_count,
    SUM(CASE WHEN r.source_pool = 'recency' THEN 1 ELSE 0 END) AS recency_count,
    ROUND(AVG(r.overall_score), 2) AS avg_overall_score
  FROM hotels h
  LEFT JOIN reviews r ON r.hotel_id = h.hotel_id
  GROUP BY h.hotel_id;

  CREATE VIEW IF NOT EXISTS v_region_crawl_progress AS
  SELECT
    h.region,
    COUNT(DISTINCT h.hotel_id) AS hotels,
    COUNT(DISTINCT r.hotel_id) AS hotels_with_reviews,
    COUNT(r.review_id) AS reviews_stored
  FROM hotels h
  LEFT JOIN reviews r ON r.hotel_id = h.hotel_id
  GROUP BY h.region;
`;
