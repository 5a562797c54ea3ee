/**
 * MongoDB collections, their $jsonSchema validators and indexes
 */

import type { Document } from 'mongodb'

export interface IndexDefinition {
  keys: Record<string, 1 | -1>
  unique?: boolean
}

export interface CollectionDefinition {
  name: string
  validator: Document
  indexes: IndexDefinition[]
}

export const SATELLITES = 'satellites'
export const GROUND_STATIONS = 'ground_stations'
export const USERS = 'users'
export const MISSION_PLANS = 'mission_plans'

export const COLLECTIONS: CollectionDefinition[] = [
  {
    name: SATELLITES,
    validator: {
      $jsonSchema: {
        bsonType: 'object',
        required: ['satellite_id', 'name', 'type', 'status'],
        properties: {
          satellite_id: { bsonType: 'string' },
          name: { bsonType: 'string' },
          type: { bsonType: 'string' },
          status: { bsonType: 'string' },
          launch_date: { bsonType: 'date' },
          mission: { bsonType: 'string' },
          owner: { bsonType: 'string' },
          tle: {
            bsonType: 'object',
            properties: {
              line1: { bsonType: 'string' },
              line2: { bsonType: 'string' },
              epoch: { bsonType: 'date' },
            },
          },
          subsystems: { bsonType: 'array' },
          metadata: { bsonType: 'object' },
        },
      },
    },
    indexes: [{ keys: { satellite_id: 1 }, unique: true }],
  },
  {
    name: GROUND_STATIONS,
    validator: {
      $jsonSchema: {
        bsonType: 'object',
        required: ['station_id', 'name', 'location'],
        properties: {
          station_id: { bsonType: 'string' },
          name: { bsonType: 'string' },
          location: {
            bsonType: 'object',
            required: ['latitude', 'longitude'],
            properties: {
              latitude: { bsonType: 'double' },
              longitude: { bsonType: 'double' },
              altitude: { bsonType: 'double' },
            },
          },
          capabilities: { bsonType: 'array' },
          status: { bsonType: 'string' },
          metadata: { bsonType: 'object' },
        },
      },
    },
    indexes: [{ keys: { station_id: 1 }, unique: true }],
  },
  {
    name: USERS,
    validator: {
      $jsonSchema: {
        bsonType: 'object',
        required: ['username', 'email', 'role'],
        properties: {
          username: { bsonType: 'string' },
          email: { bsonType: 'string' },
          first_name: { bsonType: 'string' },
          last_name: { bsonType: 'string' },
          role: { bsonType: 'string' },
          permissions: { bsonType: 'array' },
          created_at: { bsonType: 'date' },
          last_login: { bsonType: 'date' },
          settings: { bsonType: 'object' },
        },
      },
    },
    indexes: [
      { keys: { username: 1 }, unique: true },
      { keys: { email: 1 }, unique: true },
    ],
  },
  {
    name: MISSION_PLANS,
    validator: {
      $jsonSchema: {
        bsonType: 'object',
        required: ['plan_id', 'name', 'satellite_id', 'status'],
        properties: {
          plan_id: { bsonType: 'string' },
          name: { bsonType: 'string' },
          satellite_id: { bsonType: 'string' },
          created_by: { bsonType: 'string' },
          created_at: { bsonType: 'date' },
          status: { bsonType: 'string' },
          start_time: { bsonType: 'date' },
          end_time: { bsonType: 'date' },
          activities: { bsonType: 'array' },
          metadata: { bsonType: 'object' },
        },
      },
    },
    indexes: [
      { keys: { plan_id: 1 }, unique: true },
      { keys: { satellite_id: 1 } },
    ],
  },
]

export const DEFAULT_ADMIN = {
  username: 'admin',
  email: 'admin@llamaspace.io',
  first_name: 'Admin',
  last_name: 'User',
  role: 'admin',
  permissions: ['*'],
  settings: { theme: 'dark', notifications_enabled: true },
}
