export interface TvdbResponse<T> {
  status: string;
  data: T;
  links?: TvdbLinks | null;
}

export interface TvdbLinks {
  prev?: string | null;
  self?: string | null;
  next?: string | null;
  total_items?: number;
  page_size?: number;
}

export interface TvdbLoginData {
  token: string;
}

export interface TvdbEpisode {
  id: number;
  seriesId: number;
  name?: string | null;
  overview?: string | null;
  aired?: string | null;
  seasonNumber: number;
  number: number;
  runtime?: number | null;
  absoluteNumber?: number | null;
  finaleType?: string | null;
}

export interface TvdbEpisodesPage {
  episodes?: TvdbEpisode[] | null;
}
