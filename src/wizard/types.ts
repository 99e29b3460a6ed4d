/**
 * Interactive CLI - Type Definitions
 */

/**
 * Cleanup type as offered in the interactive menu and --type flag
 */
export type CleanupTypeAnswer = 'all' | 'named' | 'browse';

/**
 * Org details gathered from flags, environment and prompts
 */
export interface OrgAnswers {
  instance: string;
  clientId: string;
  clientSecret?: string;
  callbackPort?: number;
  cleanupType: CleanupTypeAnswer;
  flowNames: string[];
}
