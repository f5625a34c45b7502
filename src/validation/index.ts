export { parseOrThrow, toIssues, validationError, type ValidationIssue } from './zod.js'
