"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import type {
  DesignStatistics,
  FulfillmentOrder,
  HealthResponse,
  RequestOutcome
} from "@shirtsmith/contracts";
import { STAGE_LABELS } from "@shirtsmith/contracts";
import { createDesign, getHealth, getStats, listDesigns } from "../lib/api";
import { locale } from "../lib/locales/en-GB";

const USER_KEY = "shirtsmith.userId";
const NAME_KEY = "shirtsmith.displayName";

function browserUserId(): string {
  const existing = window.localStorage.getItem(USER_KEY);
  if (existing) {
    return existing;
  }
  const created = window.crypto.randomUUID();
  window.localStorage.setItem(USER_KEY, created);
  return created;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default function HomePage() {
  const [userId, setUserId] = useState<string | null>(null);
  const [displayName, setDisplayName] = useState("");
  const [message, setMessage] = useState('I want a t-shirt that says "Hello World"');
  const [outcome, setOutcome] = useState<RequestOutcome | null>(null);
  const [designs, setDesigns] = useState<FulfillmentOrder[]>([]);
  const [stats, setStats] = useState<DesignStatistics | null>(null);
  const [vendor, setVendor] = useState<HealthResponse | null>(null);
  const [progressIndex, setProgressIndex] = useState(0);
  const [isWorking, setIsWorking] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const progressTimerRef = useRef<number | null>(null);

  const refreshHistory = useCallback(async (forUser: string) => {
    try {
      const [mine, totals] = await Promise.all([listDesigns(forUser), getStats()]);
      setDesigns(mine.designs);
      setStats(totals);
    } catch (historyError) {
      setError(errorMessage(historyError));
    }
  }, []);

  useEffect(() => {
    const id = browserUserId();
    setUserId(id);
    setDisplayName(window.localStorage.getItem(NAME_KEY) ?? "");
    void refreshHistory(id);
    getHealth().then(setVendor, () => setVendor(null));
  }, [refreshHistory]);

  useEffect(() => {
    return () => {
      if (progressTimerRef.current !== null) {
        window.clearInterval(progressTimerRef.current);
      }
    };
  }, []);

  const handleSubmit = async () => {
    if (!userId) {
      return;
    }

    setError(null);
    setOutcome(null);
    setIsWorking(true);
    setProgressIndex(0);
    window.localStorage.setItem(NAME_KEY, displayName.trim());

    if (progressTimerRef.current !== null) {
      window.clearInterval(progressTimerRef.current);
    }
    progressTimerRef.current = window.setInterval(() => {
      setProgressIndex((prev) => Math.min(prev + 1, STAGE_LABELS.length - 1));
    }, 1200);

    try {
      const result = await createDesign({ message, userId, displayName: displayName.trim() });
      setOutcome(result);
      if (result.success) {
        await refreshHistory(userId);
      }
    } catch (submitError) {
      setError(errorMessage(submitError));
    } finally {
      if (progressTimerRef.current !== null) {
        window.clearInterval(progressTimerRef.current);
      }
      setIsWorking(false);
    }
  };

  return (
    <main className="page-shell">
      <section className="hero">
        <p className="kicker">{vendor ? (vendor.connected ? locale.vendorOnline : locale.vendorOffline) : "en-GB"}</p>
        <h1>{locale.appTitle}</h1>
        <p>{locale.strapline}</p>
      </section>

      {error ? <p className="error-banner">{error}</p> : null}

      <section className="panel">
        <label htmlFor="display-name">{locale.nameLabel}</label>
        <input
          id="display-name"
          value={displayName}
          onChange={(event) => setDisplayName(event.target.value)}
          placeholder={locale.namePlaceholder}
        />
        <label htmlFor="request">{locale.requestLabel}</label>
        <textarea
          id="request"
          value={message}
          onChange={(event) => setMessage(event.target.value)}
          placeholder={locale.requestPlaceholder}
          rows={4}
        />
        <button
          onClick={handleSubmit}
          disabled={isWorking || !userId || !message.trim() || !displayName.trim()}
        >
          {isWorking ? locale.working : locale.submitRequest}
        </button>
        {isWorking ? (
          <p>
            {locale.progress}: <strong>{STAGE_LABELS[progressIndex]}</strong>
          </p>
        ) : null}
      </section>

      {outcome ? (
        <section className="panel">
          <h2>{locale.resultHeading}</h2>
          <p className={outcome.success ? undefined : "error-banner"}>{outcome.responseText}</p>
          {outcome.phrase ? (
            <p>
              {locale.phraseLabel}: <strong>{outcome.phrase}</strong>
            </p>
          ) : null}
          {outcome.orderUrl ? (
            <div className="result-links">
              <a href={outcome.orderUrl} target="_blank" rel="noreferrer">
                {locale.viewOrder}
              </a>
            </div>
          ) : null}
        </section>
      ) : null}

      <section className="panel">
        <h2>{locale.historyHeading}</h2>
        {designs.length === 0 ? (
          <p>{locale.historyEmpty}</p>
        ) : (
          <ul>
            {designs.map((design) => (
              <li key={design.orderId}>
                <a href={design.orderUrl} target="_blank" rel="noreferrer">
                  {design.displayName}
                </a>{" "}
                ({design.status})
              </li>
            ))}
          </ul>
        )}
        <button onClick={() => userId && void refreshHistory(userId)} disabled={!userId || isWorking}>
          {locale.refreshHistory}
        </button>
      </section>

      {stats ? (
        <section className="panel">
          <h2>{locale.statsHeading}</h2>
          <p>
            {locale.statsDesigns}: <strong>{stats.totalCount}</strong> · {locale.statsMakers}:{" "}
            <strong>{stats.distinctUserCount}</strong> · {locale.statsAverage}:{" "}
            <strong>{stats.perUserAverage.toFixed(1)}</strong>
          </p>
        </section>
      ) : null}
    </main>
  );
}
