export type BuildRecord = {
  orgId: string;
  createdAt: Date;
  jobId: string;
  imageType: string;
  packages: string[];
  filesystem: string[];
  payloadRepositories: string[];
  accountNumber: string;
};

export type Dataset = readonly BuildRecord[];

export type Timestamped = {
  createdAt: Date;
};

export type FootprintRecord = Omit<BuildRecord, "imageType"> & {
  footprint: string;
};

/** Half-open interval `[start, end)`. */
export type TimeWindow = {
  start: Date;
  end: Date;
};

export type CountSeries = {
  counts: number[];
  dates: Date[];
};

export type RatioSeries = {
  ratios: number[];
  dates: Date[];
};

export type WeeklyUsers = {
  dates: Date[];
  users: number[];
  newUsers: number[];
};

export type FirstSeen = {
  orgId: string;
  createdAt: Date;
};

export type UserInfo = {
  accountNumber: string;
  orgId: string;
  name: string | null;
};

export type RankedCount = {
  key: string;
  count: number;
};

export type DatasetSummary = {
  start: Date;
  end: Date;
  builds: number;
  users: number;
  buildsWithPackages: number;
  buildsWithFilesystem: number;
  buildsWithRepos: number;
};
