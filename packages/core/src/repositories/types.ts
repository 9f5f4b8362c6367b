export const ROLE_CATEGORIES = ['actor', 'actress'] as const;
export type RoleCategory = (typeof ROLE_CATEGORIES)[number];

export interface MovieInput {
  id: string;
  title: string;
  year: number | null;
  datePublished: string | null;
  duration: number | null;
  country: string | null;
  worldwideGrossIncome: string | null;
  languages: string | null;
  productionCompany: string | null;
}

export interface MovieRecord extends MovieInput {
  worldwideGrossNum: number | null;
}

export interface NameInput {
  id: string;
  name: string;
  height: number | null;
  dateOfBirth: string | null;
  knownForMovies: string | null;
}

export interface GenreInput {
  movieId: string;
  genre: string;
}

export interface DirectorMappingInput {
  movieId: string;
  nameId: string;
}

export interface RoleMappingInput {
  movieId: string;
  nameId: string;
  category: RoleCategory;
}

export interface RatingInput {
  movieId: string;
  avgRating: number | null;
  totalVotes: number | null;
  medianRating: number | null;
}

export type RatingRecord = RatingInput;

export interface MembershipRecord {
  movieId: string;
  position: number;
  value: string;
}
