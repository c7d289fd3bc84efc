/**
 * @entry Check 查重流程模块
 */

export { checkPlagiarism, type CheckOptions } from './checkPlagiarism.js'
