import {
  pgTable,
  uuid,
  text,
  timestamp,
  jsonb,
  integer,
  pgEnum,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import type { TickReport, WorldState } from "@spark-world/shared";

// Enums
export const simulationStatusEnum = pgEnum("simulation_status", [
  "running",
  "extinct",
]);

export const ledgerReasonEnum = pgEnum("ledger_reason", [
  "upkeep",
  "bond_mint",
  "benefactor_grant",
  "benefactor_regen",
  "raid_success",
  "raid_failure",
  "spawn_cost",
  "birth_grant",
]);

// Tables
export const simulations = pgTable(
  "simulations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: text("name").notNull(),
    currentTick: integer("current_tick").notNull().default(0),
    status: simulationStatusEnum("status").notNull().default("running"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [index("idx_simulations_status").on(table.status)]
);

// One full world per tick; the highest tick is the live state
export const worldSnapshots = pgTable(
  "world_snapshots",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    simulationId: uuid("simulation_id")
      .notNull()
      .references(() => simulations.id),
    tick: integer("tick").notNull(),
    state: jsonb("state").$type<WorldState>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [
    uniqueIndex("idx_snapshots_simulation_tick").on(table.simulationId, table.tick),
  ]
);

export const tickReports = pgTable(
  "tick_reports",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    simulationId: uuid("simulation_id")
      .notNull()
      .references(() => simulations.id),
    tick: integer("tick").notNull(),
    report: jsonb("report").$type<TickReport>().notNull(),
    aliveAgents: integer("alive_agents").notNull(),
    sparksMinted: integer("sparks_minted").notNull(),
    sparksLost: integer("sparks_lost").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
  },
  (table) => [
    uniqueIndex("idx_reports_simulation_tick").on(table.simulationId, table.tick),
  ]
);

export const ledgerEntries = pgTable(
  "ledger_entries",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    simulationId: uuid("simulation_id")
      .notNull()
      .references(() => simulations.id),
    tick: integer("tick").notNull(),
    fromEntity: text("from_entity").notNull(),
    toEntity: text("to_entity").notNull(),
    amount: integer("amount").notNull(),
    reason: ledgerReasonEnum("reason").notNull(),
    note: text("note").notNull(),
  },
  (table) => [
    index("idx_ledger_simulation_tick").on(table.simulationId, table.tick),
    index("idx_ledger_reason").on(table.reason),
  ]
);

// Relations
export const simulationsRelations = relations(simulations, ({ many }) => ({
  snapshots: many(worldSnapshots),
  reports: many(tickReports),
  ledger: many(ledgerEntries),
}));

export const worldSnapshotsRelations = relations(worldSnapshots, ({ one }) => ({
  simulation: one(simulations, {
    fields: [worldSnapshots.simulationId],
    references: [simulations.id],
  }),
}));

export const tickReportsRelations = relations(tickReports, ({ one }) => ({
  simulation: one(simulations, {
    fields: [tickReports.simulationId],
    references: [simulations.id],
  }),
}));

export const ledgerEntriesRelations = relations(ledgerEntries, ({ one }) => ({
  simulation: one(simulations, {
    fields: [ledgerEntries.simulationId],
    references: [simulations.id],
  }),
}));
