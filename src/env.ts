// Loads .env before anything else reads process.env.
// ESM hoists imports, so dotenv.config() has to live in its own module that
// scripts import first.
import dotenv from 'dotenv';

dotenv.config();
