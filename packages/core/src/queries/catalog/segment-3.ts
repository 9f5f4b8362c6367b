import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_3_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q18',
    segment: 3,
    label: 'Top 5 production companies by total worldwide gross',
    parameters: [],
    sql: `
      SELECT production_company,
             ROUND(SUM(worldwide_gross_num), 2) AS total_gross
      FROM movie
      WHERE production_company <> 'Unknown'
      GROUP BY production_company
      ORDER BY total_gross DESC, production_company ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q19',
    segment: 3,
    label: 'Average rating for movies in each language',
    parameters: [],
    sql: `
      SELECT ml.language,
             ROUND(AVG(r.avg_rating), 2) AS avg_rating
      FROM movie_language ml
      JOIN ratings r ON ml.movie_id = r.movie_id
      GROUP BY ml.language
      ORDER BY avg_rating DESC, ml.language ASC
    `,
  },
  {
    id: 'Q20',
    segment: 3,
    label: 'Top 5 countries by number of movies produced',
    parameters: [],
    sql: `
      SELECT mc.country, COUNT(*) AS total_movies
      FROM movie_country mc
      GROUP BY mc.country
      ORDER BY total_movies DESC, mc.country ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q21',
    segment: 3,
    label: 'Movies released between two dates',
    parameters: ['dateFrom', 'dateTo'],
    sql: `
      SELECT title, date_published
      FROM movie
      WHERE date_published BETWEEN @dateFrom AND @dateTo
      ORDER BY date_published ASC, title ASC
    `,
  },
  {
    id: 'Q22',
    segment: 3,
    label: 'Director with the most movies in a single year',
    parameters: [],
    sql: `
      SELECT n.name AS director_name, m.year, COUNT(*) AS total_movies
      FROM director_mapping dm
      JOIN names n ON dm.name_id = n.id
      JOIN movie m ON dm.movie_id = m.id
      GROUP BY n.name, m.year
      ORDER BY total_movies DESC, director_name ASC, m.year ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q23',
    segment: 3,
    label: 'Most common actor-director pair',
    parameters: [],
    sql: `
      SELECT n_actor.name AS actor_name,
             n_director.name AS director_name,
             COUNT(*) AS movies_together
      FROM role_mapping rm
      JOIN names n_actor ON rm.name_id = n_actor.id
      JOIN director_mapping dm ON rm.movie_id = dm.movie_id
      JOIN names n_director ON dm.name_id = n_director.id
      GROUP BY n_actor.name, n_director.name
      ORDER BY movies_together DESC, actor_name ASC, director_name ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q24',
    segment: 3,
    label: 'Movies rated above the average of their genre',
    parameters: [],
    sql: `
      SELECT m.title, g.genre, r.avg_rating
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      JOIN genre g ON m.id = g.movie_id
      JOIN (
        SELECT g2.genre, AVG(r2.avg_rating) AS avg_genre_rating
        FROM genre g2
        JOIN ratings r2 ON g2.movie_id = r2.movie_id
        GROUP BY g2.genre
      ) ga ON g.genre = ga.genre
      WHERE r.avg_rating > ga.avg_genre_rating
      ORDER BY g.genre ASC, r.avg_rating DESC, m.title ASC
      LIMIT 1000
    `,
  },
];
