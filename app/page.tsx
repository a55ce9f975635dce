"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import { z } from "zod";
import { GROWTH_STAGES } from "@/lib/advice-prompt";
import { DAILY_REQUEST_CEILING } from "@/lib/request-counter";
import { sensorReadingSchema } from "@/lib/sensors";
import type { SensorReading } from "@/lib/types";

type ChatMessage = { role: "farmer" | "croptalk"; text: string; fallback?: boolean };

const askResultSchema = z.discriminatedUnion("success", [
  z.object({
    success: z.literal(true),
    response: z.string(),
    request_count: z.number(),
    sensor_data: sensorReadingSchema,
    used_fallback: z.boolean(),
  }),
  z.object({ success: z.literal(false), message: z.string() }),
]);

type CropDraft = { crops: string; stage: string; issues: string };

const EMPTY_CROP: CropDraft = { crops: "", stage: "1", issues: "" };

function SensorTile({ label, value, unit }: { label: string; value: number | undefined; unit: string }) {
  return (
    <div className="bg-surface3 border border-border rounded-lg px-3 py-2.5">
      <p className="text-muted text-xs">{label}</p>
      <p className="font-semibold text-white">
        {value ?? "–"}
        <span className="text-muted text-xs ml-1">{unit}</span>
      </p>
    </div>
  );
}

export default function CropTalkPage() {
  const [sensor, setSensor] = useState<SensorReading | null>(null);
  const [crop, setCrop] = useState<CropDraft>(EMPTY_CROP);
  const [cropSaved, setCropSaved] = useState(false);
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [question, setQuestion] = useState("");
  const [loading, setLoading] = useState(false);
  const [requestCount, setRequestCount] = useState(0);
  const [error, setError] = useState<string | null>(null);
  const bottomRef = useRef<HTMLDivElement>(null);

  const refreshSensor = useCallback(async () => {
    try {
      const res = await fetch("/api/sensor-data", { cache: "no-store" });
      if (!res.ok) throw new Error(`status ${res.status}`);
      setSensor(sensorReadingSchema.parse(await res.json()));
    } catch (err) {
      console.error("Sensor refresh error:", err);
      setError("Couldn't load sensor data.");
    }
  }, []);

  useEffect(() => {
    void refreshSensor();
  }, [refreshSensor]);

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ behavior: "smooth" });
  }, [messages]);

  const handleSetup = useCallback(async () => {
    setError(null);
    try {
      const res = await fetch("/api/setup", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ crops: crop.crops, stage: crop.stage, issues: crop.issues || "none" }),
      });
      if (!res.ok) throw new Error(`status ${res.status}`);
      setCropSaved(true);
      setMessages([]);
    } catch (err) {
      console.error("Setup error:", err);
      setError("Couldn't save crop information. Try again.");
    }
  }, [crop]);

  const handleReset = useCallback(async () => {
    setError(null);
    try {
      await fetch("/api/reset", { method: "POST" });
    } catch (err) {
      console.error("Reset error:", err);
    }
    setMessages([]);
    setCrop(EMPTY_CROP);
    setCropSaved(false);
  }, []);

  const handleAsk = useCallback(async () => {
    const text = question.trim();
    if (!text || loading) return;
    setError(null);
    setQuestion("");
    setMessages((m) => [...m, { role: "farmer", text }]);
    setLoading(true);
    try {
      const res = await fetch("/api/ask", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ question: text, sensor_data: sensor ?? undefined }),
      });
      const data = askResultSchema.parse(await res.json());
      if (data.success) {
        setMessages((m) => [...m, { role: "croptalk", text: data.response, fallback: data.used_fallback }]);
        setRequestCount(data.request_count);
        setSensor(data.sensor_data);
      } else {
        setMessages((m) => [...m, { role: "croptalk", text: data.message }]);
      }
    } catch (err) {
      console.error("Ask error:", err);
      setMessages((m) => [
        ...m,
        { role: "croptalk", text: "Something went wrong. Check your connection and try again." },
      ]);
    } finally {
      setLoading(false);
    }
  }, [question, loading, sensor]);

  return (
    <div className="min-h-screen bg-surface text-white flex flex-col font-sans">
      <header className="sticky top-0 z-10 border-b border-border bg-surface/95 backdrop-blur-sm">
        <div className="max-w-3xl mx-auto px-4 h-14 flex items-center justify-between">
          <div className="flex items-center gap-2">
            <div className="h-8 w-8 rounded-lg bg-accent flex items-center justify-center text-black font-bold text-sm">
              CT
            </div>
            <span className="text-lg font-semibold tracking-tight">CropTalk</span>
          </div>
          <span className="text-xs font-medium text-accent bg-accent/15 px-2.5 py-1 rounded-md border border-accent/30">
            {requestCount}/{DAILY_REQUEST_CEILING} requests today
          </span>
        </div>
      </header>

      <main className="flex-1 w-full max-w-3xl mx-auto px-4 py-6 pb-10 flex flex-col gap-6">
        {error && (
          <div className="rounded-xl border border-red-500/50 bg-red-500/10 px-4 py-3 text-sm text-red-200">{error}</div>
        )}

        <section className="bg-surface2 border border-border rounded-xl shadow-sm p-5">
          <div className="flex items-center justify-between gap-2 mb-4">
            <h2 className="text-sm font-medium text-muted uppercase tracking-wider">Farm conditions</h2>
            <button
              type="button"
              onClick={() => void refreshSensor()}
              className="text-xs text-muted hover:text-accent shrink-0"
            >
              New sensor data
            </button>
          </div>
          <div className="grid grid-cols-2 sm:grid-cols-5 gap-3 text-sm">
            <SensorTile label="Temperature" value={sensor?.temperature} unit="°C" />
            <SensorTile label="Humidity" value={sensor?.humidity} unit="%" />
            <SensorTile label="Soil moisture" value={sensor?.soil_moisture} unit="%" />
            <SensorTile label="Light" value={sensor?.light_level} unit="Lux" />
            <SensorTile label="Rain (24h)" value={sensor?.rainfall_last_24h} unit="mm" />
          </div>
          {sensor && <p className="text-muted text-xs mt-3">Updated {sensor.timestamp}</p>}
        </section>

        <section className="bg-surface2 border border-border rounded-xl shadow-sm p-5">
          <h2 className="text-sm font-medium text-accent uppercase tracking-wider mb-1">Your crops</h2>
          <p className="text-muted text-xs mb-4">Saving crop details starts a new conversation.</p>
          <div className="grid grid-cols-1 sm:grid-cols-4 gap-4">
            <div className="sm:col-span-2">
              <label className="block text-xs font-medium text-muted mb-1.5">Crops</label>
              <input
                value={crop.crops}
                placeholder="tomatoes, maize"
                onChange={(e) => setCrop((c) => ({ ...c, crops: e.target.value }))}
                className="w-full px-3 py-2.5 text-sm text-white bg-surface3 border border-border rounded-lg"
              />
            </div>
            <div className="sm:col-span-2">
              <label className="block text-xs font-medium text-muted mb-1.5">Growth stage</label>
              <select
                value={crop.stage}
                onChange={(e) => setCrop((c) => ({ ...c, stage: e.target.value }))}
                className="w-full px-3 py-2.5 text-sm text-white bg-surface3 border border-border rounded-lg"
              >
                {Object.entries(GROWTH_STAGES).map(([code, label]) => (
                  <option key={code} value={code}>
                    {label}
                  </option>
                ))}
              </select>
            </div>
            <div className="sm:col-span-3">
              <label className="block text-xs font-medium text-muted mb-1.5">Pests or diseases</label>
              <input
                value={crop.issues}
                placeholder="none"
                onChange={(e) => setCrop((c) => ({ ...c, issues: e.target.value }))}
                className="w-full px-3 py-2.5 text-sm text-white bg-surface3 border border-border rounded-lg"
              />
            </div>
            <div className="flex items-end">
              <button
                type="button"
                onClick={() => void handleSetup()}
                className="w-full px-4 py-2.5 rounded-lg bg-accent text-black font-semibold text-sm hover:bg-accentDim"
              >
                {cropSaved ? "Saved" : "Save crops"}
              </button>
            </div>
          </div>
        </section>

        <section className="bg-surface2 border border-border rounded-xl shadow-sm p-5 flex flex-col gap-4">
          <div className="flex items-center justify-between gap-2">
            <h2 className="text-sm font-medium text-muted uppercase tracking-wider">Ask CropTalk</h2>
            <button
              type="button"
              onClick={() => void handleReset()}
              className="px-3 py-2 rounded-lg bg-surface3 border border-border text-gray-200 text-xs font-medium hover:border-accent/50 hover:text-accent"
            >
              New chat
            </button>
          </div>

          <div className="flex flex-col gap-3 max-h-[28rem] overflow-y-auto">
            {messages.length === 0 && (
              <p className="text-muted text-sm text-center py-6">
                Ask about irrigation, pests, fertilizer or anything else on your farm.
              </p>
            )}
            {messages.map((m, i) => (
              <div
                key={i}
                className={`rounded-xl px-4 py-3 text-sm whitespace-pre-wrap ${
                  m.role === "farmer"
                    ? "self-end bg-accent/15 border border-accent/30 text-white max-w-[85%]"
                    : "self-start bg-surface3 border border-border text-gray-200 max-w-[95%]"
                }`}
              >
                {m.text}
                {m.fallback && <p className="text-muted text-xs mt-2">General guidance shown.</p>}
              </div>
            ))}
            {loading && <p className="text-muted text-xs">Consulting agricultural knowledge...</p>}
            <div ref={bottomRef} />
          </div>

          <form
            className="flex gap-2"
            onSubmit={(e) => {
              e.preventDefault();
              void handleAsk();
            }}
          >
            <input
              value={question}
              onChange={(e) => setQuestion(e.target.value)}
              placeholder="My tomato leaves are turning yellow. What should I do?"
              className="flex-1 px-3 py-2.5 text-sm text-white bg-surface3 border border-border rounded-lg"
            />
            <button
              type="submit"
              disabled={loading || !question.trim()}
              className="px-5 py-2.5 rounded-lg bg-accent text-black font-semibold text-sm hover:bg-accentDim disabled:opacity-50"
            >
              Ask
            </button>
          </form>
        </section>
      </main>
    </div>
  );
}
