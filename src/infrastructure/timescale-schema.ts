/**
 * TimescaleDB schema: satellite telemetry, orbit and maneuver tables
 */

export interface TableDefinition {
  name: string
  ddl: string
  /** Time column to partition on; plain table when absent */
  hypertable?: string
  indexes: { name: string; column: string }[]
}

export const TABLES: TableDefinition[] = [
  {
    name: 'satellite_telemetry',
    ddl: `
      CREATE TABLE IF NOT EXISTS satellite_telemetry (
        time TIMESTAMPTZ NOT NULL,
        satellite_id TEXT NOT NULL,
        subsystem TEXT NOT NULL,
        parameter TEXT NOT NULL,
        value DOUBLE PRECISION,
        status TEXT,
        metadata JSONB
      )`,
    hypertable: 'time',
    indexes: [
      { name: 'idx_satellite_telemetry_satellite_id', column: 'satellite_id' },
      { name: 'idx_satellite_telemetry_subsystem', column: 'subsystem' },
      { name: 'idx_satellite_telemetry_parameter', column: 'parameter' },
    ],
  },
  {
    name: 'satellite_orbits',
    ddl: `
      CREATE TABLE IF NOT EXISTS satellite_orbits (
        time TIMESTAMPTZ NOT NULL,
        satellite_id TEXT NOT NULL,
        position_x DOUBLE PRECISION,
        position_y DOUBLE PRECISION,
        position_z DOUBLE PRECISION,
        velocity_x DOUBLE PRECISION,
        velocity_y DOUBLE PRECISION,
        velocity_z DOUBLE PRECISION,
        metadata JSONB
      )`,
    hypertable: 'time',
    indexes: [
      { name: 'idx_satellite_orbits_satellite_id', column: 'satellite_id' },
    ],
  },
  {
    // Serial primary key without the time column rules out a hypertable
    name: 'satellite_maneuvers',
    ddl: `
      CREATE TABLE IF NOT EXISTS satellite_maneuvers (
        id SERIAL PRIMARY KEY,
        satellite_id TEXT NOT NULL,
        start_time TIMESTAMPTZ NOT NULL,
        end_time TIMESTAMPTZ,
        type TEXT NOT NULL,
        status TEXT NOT NULL,
        delta_v_x DOUBLE PRECISION,
        delta_v_y DOUBLE PRECISION,
        delta_v_z DOUBLE PRECISION,
        fuel_used DOUBLE PRECISION,
        success BOOLEAN,
        description TEXT,
        parameters JSONB,
        created_at TIMESTAMPTZ DEFAULT NOW(),
        updated_at TIMESTAMPTZ DEFAULT NOW()
      )`,
    indexes: [
      { name: 'idx_satellite_maneuvers_satellite_id', column: 'satellite_id' },
      { name: 'idx_satellite_maneuvers_status', column: 'status' },
    ],
  },
]
