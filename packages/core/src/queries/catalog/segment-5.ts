import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_5_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q32',
    segment: 5,
    label: 'Top 5 actors by average rating (at least 5 movies)',
    parameters: [],
    sql: `
      SELECT n.name AS actor_name,
             ROUND(AVG(r.avg_rating), 2) AS avg_rating,
             COUNT(*) AS total_movies
      FROM role_mapping rm
      JOIN names n ON rm.name_id = n.id
      JOIN ratings r ON rm.movie_id = r.movie_id
      GROUP BY n.name
      HAVING COUNT(*) >= 5
      ORDER BY avg_rating DESC, actor_name ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q33',
    segment: 5,
    label: 'Longest movie in each genre',
    parameters: [],
    sql: `
      SELECT g.genre, m.title, m.duration
      FROM genre g
      JOIN movie m ON g.movie_id = m.id
      WHERE (g.genre, m.duration) IN (
        SELECT g2.genre, MAX(m2.duration)
        FROM genre g2
        JOIN movie m2 ON g2.movie_id = m2.id
        GROUP BY g2.genre
      )
      ORDER BY g.genre ASC, m.title ASC
    `,
  },
  {
    id: 'Q34',
    segment: 5,
    label: 'Average gross income per production company',
    parameters: [],
    sql: `
      SELECT production_company,
             ROUND(AVG(worldwide_gross_num), 2) AS avg_gross
      FROM movie
      WHERE production_company <> 'Unknown'
        AND worldwide_gross_num > 0
      GROUP BY production_company
      ORDER BY avg_gross DESC, production_company ASC
    `,
  },
  {
    id: 'Q35',
    segment: 5,
    label: "Movies rated above their director's average",
    parameters: [],
    sql: `
      SELECT m.title, n.name AS director_name, r.avg_rating, dir_avg.avg_director_rating
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      JOIN director_mapping dm ON m.id = dm.movie_id
      JOIN names n ON dm.name_id = n.id
      JOIN (
        SELECT dm2.name_id, AVG(r2.avg_rating) AS avg_director_rating
        FROM director_mapping dm2
        JOIN ratings r2 ON dm2.movie_id = r2.movie_id
        GROUP BY dm2.name_id
      ) dir_avg ON dm.name_id = dir_avg.name_id
      WHERE r.avg_rating > dir_avg.avg_director_rating
      ORDER BY r.avg_rating DESC, m.title ASC
    `,
  },
  {
    id: 'Q36',
    segment: 5,
    label: 'Actor who acted in the most different genres',
    parameters: [],
    sql: `
      SELECT n.name AS actor_name, COUNT(DISTINCT g.genre) AS genre_count
      FROM role_mapping rm
      JOIN names n ON rm.name_id = n.id
      JOIN genre g ON rm.movie_id = g.movie_id
      GROUP BY n.name
      ORDER BY genre_count DESC, actor_name ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q37',
    segment: 5,
    label: 'Most common genre per country',
    parameters: [],
    sql: `
      WITH country_genre AS (
        SELECT mc.country, g.genre, COUNT(*) AS genre_count
        FROM movie_country mc
        JOIN genre g ON mc.movie_id = g.movie_id
        GROUP BY mc.country, g.genre
      )
      SELECT cg.country, cg.genre, cg.genre_count
      FROM country_genre cg
      WHERE cg.genre_count = (
        SELECT MAX(cg2.genre_count)
        FROM country_genre cg2
        WHERE cg2.country = cg.country
      )
      ORDER BY cg.country ASC, cg.genre ASC
    `,
  },
  {
    id: 'Q38',
    segment: 5,
    label: 'Top 10 movies by votes-to-rating ratio',
    parameters: [],
    sql: `
      SELECT m.title, r.total_votes, r.avg_rating,
             ROUND(r.total_votes / r.avg_rating, 2) AS votes_per_rating
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      WHERE r.avg_rating > 0
      ORDER BY votes_per_rating DESC, m.title ASC
      LIMIT 10
    `,
  },
];
