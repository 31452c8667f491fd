/**
 * Library Scanner Module
 */

export {
  LibraryScanner,
  type LibraryScannerOptions,
  type ScanOptions,
} from './library-scanner';
