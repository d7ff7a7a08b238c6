export * from './common.js'
export * from './auth.js'
export * from './teachers.js'
export * from './students.js'
export * from './subjects.js'
export * from './calendar.js'
export * from './assignments.js'
export * from './tasks.js'
export * from './report-cards.js'
export * from './expenses.js'
export * from './lesson-plans.js'
