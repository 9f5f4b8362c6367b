import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_6_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q39',
    segment: 6,
    label: 'Director who worked with the most unique actors',
    parameters: [],
    sql: `
      SELECT n_director.name AS director_name,
             COUNT(DISTINCT n_actor.name) AS unique_actors
      FROM director_mapping dm
      JOIN names n_director ON dm.name_id = n_director.id
      JOIN role_mapping rm ON dm.movie_id = rm.movie_id
      JOIN names n_actor ON rm.name_id = n_actor.id
      GROUP BY n_director.name
      ORDER BY unique_actors DESC, director_name ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q40',
    segment: 6,
    label: 'Average movie duration per production company',
    parameters: [],
    sql: `
      SELECT production_company,
             ROUND(AVG(duration), 2) AS avg_duration
      FROM movie
      WHERE production_company <> 'Unknown'
      GROUP BY production_company
      ORDER BY avg_duration DESC, production_company ASC
    `,
  },
  {
    id: 'Q41',
    segment: 6,
    label: 'Highest-grossing movie for each language',
    parameters: [],
    sql: `
      SELECT ml.language, m.title, m.worldwide_gross_num
      FROM movie_language ml
      JOIN movie m ON ml.movie_id = m.id
      WHERE (ml.language, m.worldwide_gross_num) IN (
        SELECT ml2.language, MAX(m2.worldwide_gross_num)
        FROM movie_language ml2
        JOIN movie m2 ON ml2.movie_id = m2.id
        GROUP BY ml2.language
      )
      ORDER BY ml.language ASC, m.title ASC
    `,
  },
  {
    id: 'Q42',
    segment: 6,
    label: 'Actors who appeared in movies from the most countries',
    parameters: [],
    sql: `
      SELECT n.name AS actor_name, COUNT(DISTINCT mc.country) AS country_count
      FROM role_mapping rm
      JOIN names n ON rm.name_id = n.id
      JOIN movie_country mc ON rm.movie_id = mc.movie_id
      GROUP BY n.name
      ORDER BY country_count DESC, actor_name ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q43',
    segment: 6,
    label: 'Total worldwide gross per year',
    parameters: [],
    sql: `
      SELECT year,
             ROUND(SUM(worldwide_gross_num), 2) AS total_gross
      FROM movie
      WHERE worldwide_gross_num > 0
      GROUP BY year
      ORDER BY year ASC
    `,
  },
  {
    id: 'Q44',
    segment: 6,
    label: 'Actor with the highest total worldwide gross',
    parameters: [],
    sql: `
      SELECT n.name AS actor_name,
             ROUND(SUM(m.worldwide_gross_num), 2) AS total_actor_gross
      FROM role_mapping rm
      JOIN names n ON rm.name_id = n.id
      JOIN movie m ON rm.movie_id = m.id
      WHERE m.worldwide_gross_num > 0
      GROUP BY n.name
      ORDER BY total_actor_gross DESC, actor_name ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q45',
    segment: 6,
    label: 'Number of movies in each rating value',
    parameters: [],
    sql: `
      SELECT avg_rating, COUNT(*) AS movie_count
      FROM ratings
      GROUP BY avg_rating
      ORDER BY avg_rating DESC
    `,
  },
];
