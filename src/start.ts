import app from './index';
import { getLibrary } from './db/library';
import { seedOnStart } from '../seed/seed';

const port = process.env.PORT ?? 7000;

function seedInBackground() {
  seedOnStart(getLibrary())
    .then((summary) => {
      if (summary) {
        console.log(
          `Library seeded with ${summary.books} books and ${summary.members} members`
        );
      }
    })
    .catch((err) => {
      console.error('Library seeding failed', err);
    });
}

const server = app.listen(port, () => {
  console.log(`Server started on http://localhost:${port}`);
  seedInBackground();
});

server.on('error', (err) => {
  console.error('Failed to start server', err);
  process.exitCode = 1;
});
