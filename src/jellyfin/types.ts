export interface JellyfinUser {
  Id: string;
  Name: string;
}

export interface JellyfinUserData {
  Played?: boolean;
  LastPlayedDate?: string | null;
}

export interface JellyfinItem {
  Id: string;
  Name: string;
  Type?: string;
  Path?: string;
  SeriesName?: string;
  SeasonName?: string;
  IndexNumber?: number | null;
  ParentIndexNumber?: number | null;
  RunTimeTicks?: number | null;
  ProviderIds?: Record<string, string> | null;
  UserData?: JellyfinUserData | null;
}

export interface JellyfinItemsResponse {
  Items?: JellyfinItem[] | null;
  TotalRecordCount?: number;
}
