export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
};

// Replica set URIs list several hosts, which URL cannot parse; only the scheme is checked.
const mongoUriPattern = /^mongodb(\+srv)?:\/\/[^/\s]+/;

const validateMongoUri = (name: string, value: string): string => {
  if (!mongoUriPattern.test(value)) {
    const scheme = value.includes("://") ? value.slice(0, value.indexOf("://")) : "<none>";
    throw new Error(`${name} must be a mongodb:// or mongodb+srv:// URI. Received scheme: ${scheme}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/ci");
  const MONGO_DB_NAME = env.MONGO_DB_NAME?.trim() || "ci";

  return { MONGO_URI, MONGO_DB_NAME };
};
