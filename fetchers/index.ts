/**
 * Data Fetchers - Index
 */

export * from './rankings-page';
