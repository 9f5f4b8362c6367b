import type { AnalyticalQueryDefinition } from '../types.ts';

export const SEGMENT_2_QUERIES: ReadonlyArray<AnalyticalQueryDefinition> = [
  {
    id: 'Q10',
    segment: 2,
    label: 'Top 5 directors by average movie rating',
    parameters: [],
    sql: `
      SELECT n.name AS director_name,
             ROUND(AVG(r.avg_rating), 2) AS avg_director_rating
      FROM director_mapping dm
      JOIN names n ON dm.name_id = n.id
      JOIN ratings r ON dm.movie_id = r.movie_id
      GROUP BY n.name
      ORDER BY avg_director_rating DESC, director_name ASC
      LIMIT 5
    `,
  },
  {
    id: 'Q11',
    segment: 2,
    label: 'Top 10 actors by number of movies',
    parameters: [],
    sql: `
      SELECT n.name AS actor_name,
             COUNT(rm.movie_id) AS total_movies
      FROM role_mapping rm
      JOIN names n ON rm.name_id = n.id
      GROUP BY n.name
      ORDER BY total_movies DESC, actor_name ASC
      LIMIT 10
    `,
  },
  {
    id: 'Q12',
    segment: 2,
    label: 'Highest-grossing movie for each year',
    parameters: [],
    sql: `
      SELECT m.year, m.title, m.worldwide_gross_num
      FROM movie m
      WHERE m.worldwide_gross_num = (
        SELECT MAX(m2.worldwide_gross_num)
        FROM movie m2
        WHERE m2.year = m.year
      )
      ORDER BY m.year ASC, m.title ASC
    `,
  },
  {
    id: 'Q13',
    segment: 2,
    label: 'Genre with the highest average rating',
    parameters: [],
    sql: `
      SELECT g.genre,
             ROUND(AVG(r.avg_rating), 2) AS avg_genre_rating
      FROM genre g
      JOIN ratings r ON g.movie_id = r.movie_id
      GROUP BY g.genre
      ORDER BY avg_genre_rating DESC, g.genre ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q14',
    segment: 2,
    label: 'Most common language among movies',
    parameters: [],
    sql: `
      SELECT language, COUNT(*) AS movie_count
      FROM movie_language
      GROUP BY language
      ORDER BY movie_count DESC, language ASC
      LIMIT 1
    `,
  },
  {
    id: 'Q15',
    segment: 2,
    label: 'Movies released each month of a given year',
    parameters: ['year'],
    sql: `
      SELECT CAST(strftime('%m', date_published) AS INTEGER) AS release_month,
             COUNT(*) AS total_movies
      FROM movie
      WHERE year = @year
        AND date_published IS NOT NULL
      GROUP BY release_month
      ORDER BY release_month ASC
    `,
  },
  {
    id: 'Q16',
    segment: 2,
    label: 'Movies with a median rating of 10 and more than 1000 votes',
    parameters: [],
    sql: `
      SELECT m.title, r.median_rating, r.total_votes
      FROM movie m
      JOIN ratings r ON m.id = r.movie_id
      WHERE r.median_rating = 10
        AND r.total_votes > 1000
      ORDER BY r.total_votes DESC, m.title ASC
    `,
  },
  {
    id: 'Q17',
    segment: 2,
    label: 'Percentage of movies in each genre',
    parameters: [],
    sql: `
      SELECT g.genre,
             ROUND(COUNT(*) * 100.0 / (SELECT COUNT(*) FROM movie), 2) AS percentage
      FROM genre g
      GROUP BY g.genre
      ORDER BY percentage DESC, g.genre ASC
    `,
  },
];
