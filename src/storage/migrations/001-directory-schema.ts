/**
 * Gatehouse - Directory Schema Migration
 * Allow-list tables consulted by the IP and token authorizers
 */

export const migrationName = '001-directory-schema';

export const up = `
CREATE EXTENSION IF NOT EXISTS "pgcrypto";

-- =============================================================================
-- Status enum shared by both allow-lists. Only 'active' authorizes.
-- =============================================================================
DO $$ BEGIN
  CREATE TYPE allow_list_status AS ENUM ('active', 'inactive', 'banned');
EXCEPTION
  WHEN duplicate_object THEN null;
END $$;

-- =============================================================================
-- Allowed IP Addresses
-- =============================================================================
CREATE TABLE IF NOT EXISTS allowed_ip_addresses (
  id BIGSERIAL PRIMARY KEY,
  uuid UUID NOT NULL UNIQUE DEFAULT gen_random_uuid(),
  ip_address TEXT NOT NULL UNIQUE,
  status allow_list_status NOT NULL DEFAULT 'active',
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_allowed_ip_addresses_status ON allowed_ip_addresses (status);

-- =============================================================================
-- API Tokens
-- =============================================================================
CREATE TABLE IF NOT EXISTS api_tokens (
  id BIGSERIAL PRIMARY KEY,
  uuid UUID NOT NULL UNIQUE DEFAULT gen_random_uuid(),
  token TEXT NOT NULL UNIQUE,
  status allow_list_status NOT NULL DEFAULT 'active',
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_api_tokens_status ON api_tokens (status);

-- =============================================================================
-- Keep updated_at current
-- =============================================================================
CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
  NEW.updated_at = NOW();
  RETURN NEW;
END;
$$ language 'plpgsql';

DROP TRIGGER IF EXISTS update_allowed_ip_addresses_updated_at ON allowed_ip_addresses;
CREATE TRIGGER update_allowed_ip_addresses_updated_at
  BEFORE UPDATE ON allowed_ip_addresses
  FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();

DROP TRIGGER IF EXISTS update_api_tokens_updated_at ON api_tokens;
CREATE TRIGGER update_api_tokens_updated_at
  BEFORE UPDATE ON api_tokens
  FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();
`;
