import { GoogleGenAI } from "@google/genai";

let googleClient: GoogleGenAI | null = null;

export function getGoogleClient(apiKey: string | undefined): GoogleGenAI {
  if (!googleClient) {
    if (!apiKey) {
      throw new Error("GEMINI_API_KEY environment variable is not set");
    }
    googleClient = new GoogleGenAI({ apiKey });
  }
  return googleClient;
}
