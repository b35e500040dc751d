export const STORE_SCHEMA_SQL: string[] = [
  'CREATE TABLE IF NOT EXISTS threads (`unique_id` TEXT NOT NULL, `title` TEXT, `participants` TEXT NOT NULL DEFAULT \'[]\', `created_at` INTEGER NOT NULL, PRIMARY KEY(`unique_id`))',
  'CREATE TABLE IF NOT EXISTS interactions (`row_id` INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, `unique_id` TEXT NOT NULL, `thread_unique_id` TEXT NOT NULL, `kind` TEXT NOT NULL, `timestamp` INTEGER NOT NULL, `latest_revision_id` TEXT, `record` TEXT NOT NULL)',
  'CREATE TABLE IF NOT EXISTS reactions (`id` INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL, `message_unique_id` TEXT NOT NULL, `reactor_address` TEXT NOT NULL, `emoji` TEXT NOT NULL, `sent_at` INTEGER NOT NULL, `sort_order` INTEGER NOT NULL)',
  'CREATE UNIQUE INDEX IF NOT EXISTS `index_interactions_unique_id` ON `interactions` (`unique_id`)',
  'CREATE INDEX IF NOT EXISTS `index_interactions_thread_unique_id` ON `interactions` (`thread_unique_id`)',
  'CREATE INDEX IF NOT EXISTS `index_interactions_latest_revision_id` ON `interactions` (`latest_revision_id`)',
  'CREATE INDEX IF NOT EXISTS `index_reactions_message_unique_id` ON `reactions` (`message_unique_id`)',
];
