import dotenv from 'dotenv';

// Populates process.env from .env in the working directory, if present.
dotenv.config();
