import { int, mysqlTable, varchar } from 'drizzle-orm/mysql-core';

// Column declaration order is the export order: header row and SELECT list both follow it.

export const groupResults = mysqlTable('t_group', {
  eventName: varchar('event_name', { length: 255 }).notNull(),
  teamName: varchar('team_name', { length: 255 }).notNull(),
  classNum: varchar('class_num', { length: 32 }).notNull(),
  position: int('position'),
});

export const individualResults = mysqlTable('t_individual', {
  eventName: varchar('event_name', { length: 255 }).notNull(),
  studentName: varchar('student_name', { length: 255 }).notNull(),
  classNum: varchar('class_num', { length: 32 }).notNull(),
  house: varchar('house', { length: 64 }),
  position: int('position'),
});
