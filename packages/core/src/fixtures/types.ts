import { z } from 'zod/v4';
import { ROLE_CATEGORIES } from '../repositories/types.ts';

const nullableText = z.string().nullable().default(null);
const nullableInt = z.number().int().nullable().default(null);

export const DatasetMovieSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  year: nullableInt,
  datePublished: z.iso.date().nullable().default(null),
  duration: z.number().int().nonnegative().nullable().default(null),
  country: nullableText,
  worldwideGrossIncome: nullableText,
  languages: nullableText,
  productionCompany: nullableText,
});

export const DatasetNameSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  height: nullableInt,
  dateOfBirth: z.iso.date().nullable().default(null),
  knownForMovies: nullableText,
});

export const DatasetGenreSchema = z.object({
  movieId: z.string().min(1),
  genre: z.string().min(1),
});

export const DatasetDirectorMappingSchema = z.object({
  movieId: z.string().min(1),
  nameId: z.string().min(1),
});

export const DatasetRoleMappingSchema = z.object({
  movieId: z.string().min(1),
  nameId: z.string().min(1),
  category: z.enum(ROLE_CATEGORIES),
});

export const DatasetRatingSchema = z.object({
  movieId: z.string().min(1),
  avgRating: z.number().min(0).max(10).nullable().default(null),
  totalVotes: z.number().int().nonnegative().nullable().default(null),
  medianRating: z.number().int().min(0).max(10).nullable().default(null),
});

export const DatasetFixtureSchema = z
  .object({
    generatedAt: z.iso.datetime(),
    movies: z.array(DatasetMovieSchema),
    names: z.array(DatasetNameSchema).default([]),
    genres: z.array(DatasetGenreSchema).default([]),
    directorMappings: z.array(DatasetDirectorMappingSchema).default([]),
    roleMappings: z.array(DatasetRoleMappingSchema).default([]),
    ratings: z.array(DatasetRatingSchema).default([]),
  })
  .superRefine((fixture, ctx) => {
    const seen = new Set<string>();
    fixture.movies.forEach((movie, index) => {
      if (seen.has(movie.id)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate movie id ${movie.id}`,
          path: ['movies', index, 'id'],
        });
      }
      seen.add(movie.id);
    });
  });

export type DatasetFixture = z.infer<typeof DatasetFixtureSchema>;

export interface SeedDatasetResult {
  moviesInserted: number;
  namesInserted: number;
  genresInserted: number;
  directorMappingsInserted: number;
  roleMappingsInserted: number;
  ratingsInserted: number;
}
