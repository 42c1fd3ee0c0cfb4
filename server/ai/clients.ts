import { GoogleGenAI } from "@google/genai";
import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import type { Env } from "../config.js";
import { BackendUnavailableError } from "./types.js";

// Failures fall back to the built-in generators, so the SDKs must not retry on their own
const NO_RETRIES = 0;

let geminiClient: GoogleGenAI | null = null;
let openaiClient: OpenAI | null = null;
let anthropicClient: Anthropic | null = null;
let ollamaClient: OpenAI | null = null;
let huggingFaceClient: OpenAI | null = null;

export function getGemini(env: Env): GoogleGenAI {
  if (!geminiClient) {
    const apiKey = env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new BackendUnavailableError("gemini", "Missing GEMINI_API_KEY");
    }
    geminiClient = new GoogleGenAI({ apiKey });
  }
  return geminiClient;
}

export function getOpenAI(env: Env): OpenAI {
  if (!openaiClient) {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new BackendUnavailableError("openai", "Missing OPENAI_API_KEY");
    }
    openaiClient = new OpenAI({ apiKey, maxRetries: NO_RETRIES });
  }
  return openaiClient;
}

export function getAnthropic(env: Env): Anthropic {
  if (!anthropicClient) {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new BackendUnavailableError("anthropic", "Missing ANTHROPIC_API_KEY");
    }
    anthropicClient = new Anthropic({ apiKey, maxRetries: NO_RETRIES });
  }
  return anthropicClient;
}

/** Ollama serves an OpenAI-compatible API under /v1 and ignores the key */
export function getOllama(env: Env): OpenAI {
  if (!ollamaClient) {
    const baseURL = `${env.OLLAMA_BASE_URL.replace(/\/+$/, "")}/v1`;
    ollamaClient = new OpenAI({ apiKey: "ollama", baseURL, maxRetries: NO_RETRIES });
  }
  return ollamaClient;
}

export function getHuggingFace(env: Env): OpenAI {
  if (!huggingFaceClient) {
    const apiKey = env.HF_TOKEN;
    if (!apiKey) {
      throw new BackendUnavailableError("huggingface", "Missing HF_TOKEN");
    }
    huggingFaceClient = new OpenAI({ apiKey, baseURL: env.HF_BASE_URL, maxRetries: NO_RETRIES });
  }
  return huggingFaceClient;
}
