import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_4_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q25',
    segment: 4,
    label: 'Top 5 genres by total worldwide gross',
    parameters: [],
    sql: `
      SELECT g.genre,
             ROUND(SUM(m.worldwide_gross_num), 2) AS total_gross
      FROM genre g
      JOIN movie m ON g.movie_id = m.id
      WHERE m.worldwide_gross_num > 0
      GROUP BY g.genre
      ORDER BY total_gross DESC, g.genre ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q26',
    segment: 4,
    label: 'Average movie duration per genre',
    parameters: [],
    sql: `
      SELECT g.genre,
             ROUND(AVG(m.duration), 2) AS avg_duration
      FROM genre g
      JOIN movie m ON g.movie_id = m.id
      GROUP BY g.genre
      ORDER BY avg_duration DESC, g.genre ASC
    `,
  },
  {
    id: 'Q27',
    segment: 4,
    label: 'Actors who worked with the most different directors',
    parameters: [],
    sql: `
      SELECT n_actor.name AS actor_name,
             COUNT(DISTINCT n_director.name) AS unique_directors
      FROM role_mapping rm
      JOIN names n_actor ON rm.name_id = n_actor.id
      JOIN director_mapping dm ON rm.movie_id = dm.movie_id
      JOIN names n_director ON dm.name_id = n_director.id
      GROUP BY n_actor.name
      ORDER BY unique_directors DESC, actor_name ASC
      LIMIT 10
    `,
  },
  {
    id: 'Q28',
    segment: 4,
    label: 'Top 3 most common director-genre combinations',
    parameters: [],
    sql: `
      SELECT n.name AS director_name, g.genre, COUNT(*) AS total_movies
      FROM director_mapping dm
      JOIN names n ON dm.name_id = n.id
      JOIN genre g ON dm.movie_id = g.movie_id
      GROUP BY n.name, g.genre
      ORDER BY total_movies DESC, director_name ASC, g.genre ASC
      LIMIT 3
    `,
  },
  {
    id: 'Q29',
    segment: 4,
    label: 'Top-rated movie for each genre',
    parameters: [],
    sql: `
      SELECT g.genre, m.title, r.avg_rating
      FROM genre g
      JOIN movie m ON g.movie_id = m.id
      JOIN ratings r ON m.id = r.movie_id
      WHERE (g.genre, r.avg_rating) IN (
        SELECT g2.genre, MAX(r2.avg_rating)
        FROM genre g2
        JOIN ratings r2 ON g2.movie_id = r2.movie_id
        GROUP BY g2.genre
      )
      ORDER BY g.genre ASC, m.title ASC
    `,
  },
  {
    id: 'Q30',
    segment: 4,
    label: 'Percentage contribution of each country to total worldwide gross',
    parameters: [],
    sql: `
      SELECT mc.country,
             ROUND(SUM(m.worldwide_gross_num) * 100.0 / (SELECT SUM(worldwide_gross_num) FROM movie), 2)
               AS percentage_gross
      FROM movie_country mc
      JOIN movie m ON mc.movie_id = m.id
      WHERE m.worldwide_gross_num > 0
      GROUP BY mc.country
      ORDER BY percentage_gross DESC, mc.country ASC
    `,
  },
  {
    id: 'Q31',
    segment: 4,
    label: 'Month with the most releases across all years',
    parameters: [],
    sql: `
      SELECT CAST(strftime('%m', date_published) AS INTEGER) AS release_month,
             COUNT(*) AS total_movies
      FROM movie
      WHERE date_published IS NOT NULL
      GROUP BY release_month
      ORDER BY total_movies DESC, release_month ASC
      LIMIT 1
    `,
  },
];
