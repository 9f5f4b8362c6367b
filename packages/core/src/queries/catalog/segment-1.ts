import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_1_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q01',
    segment: 1,
    label: 'List all the movies released in a given year',
    parameters: ['year'],
    sql: `
      SELECT id, title, year, date_published
      FROM movie
      WHERE year = @year
      ORDER BY date_published ASC, id ASC
    `,
  },
  {
    id: 'Q02',
    segment: 1,
    label: 'Number of movies released each year',
    parameters: [],
    sql: `
      SELECT year, COUNT(*) AS total_movies
      FROM movie
      GROUP BY year
      ORDER BY year ASC
    `,
  },
  {
    id: 'Q03',
    segment: 1,
    label: 'Top 5 movies with the highest average rating',
    parameters: [],
    sql: `
      SELECT m.title, r.avg_rating
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      ORDER BY r.avg_rating DESC, m.title ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q04',
    segment: 1,
    label: 'All distinct genres in the dataset',
    parameters: [],
    sql: `
      SELECT DISTINCT genre
      FROM genre
      ORDER BY genre ASC
    `,
  },
  {
    id: 'Q05',
    segment: 1,
    label: 'Movies with more than one genre',
    parameters: [],
    sql: `
      SELECT m.title, COUNT(g.genre) AS genre_count
      FROM movie m
      JOIN genre g ON m.id = g.movie_id
      GROUP BY m.id, m.title
      HAVING COUNT(g.genre) > 1
      ORDER BY genre_count DESC, m.title ASC
    `,
  },
  {
    id: 'Q06',
    segment: 1,
    label: 'Movies a given actor acted in',
    parameters: ['actorName'],
    sql: `
      SELECT m.title, m.year
      FROM movie m
      JOIN role_mapping rm ON m.id = rm.movie_id
      JOIN names n ON rm.name_id = n.id
      WHERE n.name = @actorName
      ORDER BY m.year ASC, m.title ASC
    `,
  },
  {
    id: 'Q07',
    segment: 1,
    label: 'Number of movies directed by each director',
    parameters: [],
    sql: `
      SELECT n.name AS director_name, COUNT(dm.movie_id) AS movies_directed
      FROM director_mapping dm
      JOIN names n ON dm.name_id = n.id
      GROUP BY n.name
      ORDER BY movies_directed DESC, director_name ASC
    `,
  },
  {
    id: 'Q08',
    segment: 1,
    label: 'Movies in English and at least one other language',
    parameters: [],
    sql: `
      SELECT title, languages
      FROM movie
      WHERE languages LIKE '%English%'
        AND languages LIKE '%,%'
      ORDER BY title ASC
    `,
  },
  {
    id: 'Q09',
    segment: 1,
    label: 'Movies produced by a given production company',
    parameters: ['productionCompany'],
    sql: `
      SELECT id, title, year
      FROM movie
      WHERE production_company = @productionCompany
      ORDER BY year ASC, title ASC
    `,
  },
];
