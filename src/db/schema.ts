// server/src/db/schema.ts
import {
  pgTable, bigserial, integer, text, timestamp, numeric,
  index, unique, check,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";

/* ========================= users ========================= */
export const users = pgTable("users", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  username: text("username").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (t) => [
  index("idx_users_username").on(t.username),
]);

/* ========================= production_info ========================= */
// One row per order sheet line: order + model + brand + job type, per upload day.
export const productionInfo = pgTable("production_info", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  orderNo: text("order_no").notNull(),
  model: text("model").notNull(),
  brandNo: text("brand_no").notNull(),
  quantity: integer("quantity").notNull(),
  jobType: text("job_type").notNull(),
  worklogNo: text("worklog_no").notNull(), // links the order line to worklog sheets
  performanceFactor: numeric("performance_factor", { precision: 6, scale: 2 }).notNull(),
  uploadDate: timestamp("upload_date", { withTimezone: true }).notNull().defaultNow(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (t) => [
  unique("uq_prodinfo").on(t.orderNo, t.model, t.brandNo, t.jobType, t.uploadDate),
  index("idx_prodinfo_order_date").on(t.orderNo, t.uploadDate.desc()),
  index("idx_prodinfo_job_type").on(t.jobType),
  index("idx_prodinfo_worklog_no").on(t.worklogNo),
  check("production_info_quantity_check", sql`${t.quantity} > 0`),
  check("production_info_performance_factor_check", sql`${t.performanceFactor} > 0`),
]);

/* ========================= employee_worklog ========================= */
export const employeeWorklog = pgTable("employee_worklog", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  orderNo: text("order_no").notNull(),
  model: text("model"),
  brandNo: text("brand_no"),
  employeeId: text("employee_id").notNull(),
  employeeName: text("employee_name"),
  jobType: text("job_type").notNull(),
  quantity: integer("quantity").notNull(),
  performanceFactor: numeric("performance_factor", { precision: 6, scale: 2 }).notNull(),
  // quantity × performance_factor
  performanceAmount: numeric("performance_amount", { precision: 18, scale: 2 }).notNull(),
  workDate: timestamp("work_date", { withTimezone: true }).notNull().defaultNow(),
  uploadDate: timestamp("upload_date", { withTimezone: true }).notNull().defaultNow(),
  validationResult: text("validation_result").notNull().default("未校验"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (t) => [
  index("idx_worklog_emp_date").on(t.employeeId, t.workDate.desc()),
  index("idx_worklog_order_date").on(t.orderNo, t.workDate.desc()),
  index("idx_worklog_job_date").on(t.jobType, t.workDate.desc()),
  check("employee_worklog_quantity_check", sql`${t.quantity} > 0`),
  check("employee_worklog_performance_factor_check", sql`${t.performanceFactor} > 0`),
  check("employee_worklog_performance_amount_check", sql`${t.performanceAmount} > 0`),
]);

export type User = typeof users.$inferSelect;
export type ProductionInfo = typeof productionInfo.$inferSelect;
export type NewProductionInfo = typeof productionInfo.$inferInsert;
export type EmployeeWorklog = typeof employeeWorklog.$inferSelect;
export type NewEmployeeWorklog = typeof employeeWorklog.$inferInsert;

export const insertProductionInfoSchema = createInsertSchema(productionInfo);
export const insertEmployeeWorklogSchema = createInsertSchema(employeeWorklog);
