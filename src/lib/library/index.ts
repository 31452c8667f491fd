/**
 * Library Module
 *
 * Library service and the background indexing task handle.
 */

export {
  LibraryService,
  type FileScanner,
  type LibraryServiceOptions,
  type ListMoviesOptions,
  type IndexOptions,
  type LibraryStatus,
} from './library-service';

export {
  IndexingTask,
  IndexingCancelledError,
  type IndexingJob,
  type IndexingState,
  type IndexingStatus,
} from './indexing-task';
