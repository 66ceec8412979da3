// src/scripts/setRole.ts
import dotenv from "dotenv";
import { connectDatabase } from "../utils/db";
import { MongoUserStore, USER_ROLES, type UserRole } from "../services/userStore";

dotenv.config();

const email = process.argv.find((a) => a.startsWith("--email="))?.split("=")[1]?.toLowerCase();
const roleArg = (process.argv.find((a) => a.startsWith("--role="))?.split("=")[1] || "").toLowerCase();
const role: UserRole | undefined = USER_ROLES.find((r) => r === roleArg);

if (!email || !role) {
  console.error(`Usage: tsx src/scripts/setRole.ts --email=user@example.com --role=${USER_ROLES.join("|")}`);
  process.exit(1);
}

(async (email: string, role: UserRole) => {
  const uri = process.env.MONGO_URI;
  const dbName = process.env.MONGO_DB_NAME;
  if (!uri || !dbName) throw new Error("❌ Missing MongoDB URI or DB Name in .env");

  const database = await connectDatabase(uri, dbName);
  try {
    const ok = await new MongoUserStore(database.db).setRole(email, role);
    console.log(ok ? `✅ Set ${email} -> ${role}` : `❌ User not found: ${email}`);
  } finally {
    await database.close();
  }
})(email, role).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
