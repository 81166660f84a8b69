import 'dotenv/config';
import express from 'express';
import helmet from 'helmet';
import { libraryRoutes } from './routes/library.routes';

const app = express();

app.use(helmet());
app.use(express.json());

app.use('/api', libraryRoutes);

export default app;
