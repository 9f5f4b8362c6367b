import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_7_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q46',
    segment: 7,
    label: 'Top 5 directors by average worldwide gross (at least 2 movies)',
    parameters: [],
    sql: `
      SELECT n.name AS director_name,
             ROUND(AVG(m.worldwide_gross_num), 2) AS avg_gross,
             COUNT(*) AS total_movies
      FROM director_mapping dm
      JOIN names n ON dm.name_id = n.id
      JOIN movie m ON dm.movie_id = m.id
      WHERE m.worldwide_gross_num > 0
      GROUP BY n.name
      HAVING COUNT(*) >= 2
      ORDER BY avg_gross DESC, director_name ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q47',
    segment: 7,
    label: 'Average rating per country',
    parameters: [],
    sql: `
      SELECT mc.country,
             ROUND(AVG(r.avg_rating), 2) AS avg_rating
      FROM movie_country mc
      JOIN ratings r ON mc.movie_id = r.movie_id
      GROUP BY mc.country
      ORDER BY avg_rating DESC, mc.country ASC
    `,
  },
  {
    id: 'Q48',
    segment: 7,
    label: 'Year with the highest average movie rating',
    parameters: [],
    sql: `
      SELECT m.year,
             ROUND(AVG(r.avg_rating), 2) AS avg_rating
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      GROUP BY m.year
      ORDER BY avg_rating DESC, m.year ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q49',
    segment: 7,
    label: 'Most frequent co-actor pair',
    parameters: [],
    sql: `
      SELECT n1.name AS actor_1, n2.name AS actor_2, COUNT(*) AS movies_together
      FROM role_mapping rm1
      JOIN role_mapping rm2 ON rm1.movie_id = rm2.movie_id AND rm1.name_id < rm2.name_id
      JOIN names n1 ON rm1.name_id = n1.id
      JOIN names n2 ON rm2.name_id = n2.id
      GROUP BY n1.name, n2.name
      ORDER BY movies_together DESC, actor_1 ASC, actor_2 ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q50',
    segment: 7,
    label: 'Top 10 movies by rating-to-duration ratio',
    parameters: [],
    sql: `
      SELECT m.title, m.duration, r.avg_rating,
             ROUND(r.avg_rating / m.duration, 4) AS rating_per_minute
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      WHERE m.duration > 0
      ORDER BY rating_per_minute DESC, m.title ASC
      LIMIT 10
    `,
  },
];
