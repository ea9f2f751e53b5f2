import mongoose from "mongoose"

export const connectMongo = async (uri: string | undefined) => {
  if (!uri) throw new Error("MONGODB_URI not set")
  await mongoose.connect(uri)
  console.log("✅ [DB] MongoDB connected")
}
