"use client";

import { useState } from "react";
import type { CSSProperties, FormEvent } from "react";

const FIQH_SCHOOLS = ["Hanafi", "Maliki", "Shafi'i", "Hanbali", "Ja'fari"];

interface AskResponse {
  response: string;
}

function isAskResponse(value: unknown): value is AskResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof (value as Record<string, unknown>).response === "string"
  );
}

const styles: Record<string, CSSProperties> = {
  main: {
    maxWidth: 760,
    margin: "40px auto",
    padding: "0 16px",
    fontFamily: "Arial, sans-serif",
  },
  form: { display: "flex", flexDirection: "column", gap: 12 },
  textarea: { minHeight: 96, padding: 10, fontSize: 16, resize: "vertical" },
  select: { padding: 8, fontSize: 16 },
  button: {
    padding: "10px 16px",
    fontSize: 16,
    background: "#16a085",
    color: "#fff",
    border: "none",
    borderRadius: 4,
    cursor: "pointer",
  },
  response: {
    marginTop: 24,
    padding: 16,
    border: "1px solid #e0e0e0",
    borderRadius: 6,
    minHeight: 48,
  },
};

export default function Home() {
  const [question, setQuestion] = useState("");
  const [fiqh, setFiqh] = useState("");
  const [responseHtml, setResponseHtml] = useState("");
  const [isLoading, setIsLoading] = useState(false);

  // Handle form submission
  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();

    const trimmedQuestion = question.trim();
    if (!trimmedQuestion || !fiqh) {
      setResponseHtml("<p>Please enter a question and select a Fiqh.</p>");
      return;
    }

    setIsLoading(true);
    setResponseHtml("<p>Loading...</p>");

    try {
      const response = await fetch("/ask", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ question: trimmedQuestion, fiqh }),
      });

      // 400 and 500 replies also carry a displayable fragment
      const data: unknown = await response.json();
      if (!isAskResponse(data)) {
        throw new Error("Failed to fetch response from server.");
      }
      setResponseHtml(data.response);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Request failed";
      setResponseHtml(`<p>Error: ${message}</p>`);
    } finally {
      setIsLoading(false);
    }
  };

  return (
    <main style={styles.main}>
      <h1>Islamic Fatwa Assistant</h1>
      <p>Ask a question about Islam and choose the school of Fiqh to answer from.</p>

      <form style={styles.form} onSubmit={handleSubmit}>
        <textarea
          style={styles.textarea}
          value={question}
          onChange={(e) => setQuestion(e.target.value)}
          placeholder="e.g. What is the ruling on fasting while travelling?"
        />
        <select style={styles.select} value={fiqh} onChange={(e) => setFiqh(e.target.value)}>
          <option value="">Select Fiqh</option>
          {FIQH_SCHOOLS.map((school) => (
            <option key={school} value={school}>
              {school}
            </option>
          ))}
        </select>
        <button type="submit" style={styles.button} disabled={isLoading}>
          {isLoading ? "Asking..." : "Ask"}
        </button>
      </form>

      <div style={styles.response} dangerouslySetInnerHTML={{ __html: responseHtml }} />
    </main>
  );
}
