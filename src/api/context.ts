import { SearchEngine } from '../services/searchService';
import { SessionStore } from '../services/sessionStore';
import { NewsStore } from '../types/store';

export interface PagingSettings {
  pageSize: number;
  searchPageSize: number;
  latestCount: number;
}

/** Shared collaborators handed to every route module. */
export interface AppContext {
  store: NewsStore;
  engine: SearchEngine;
  searchSessions: SessionStore;
  sourceSessions: SessionStore;
  paging: PagingSettings;
}
