import { EmbedBuilder } from "discord.js";
import { CandidateTrend, CurrentState, TrackerStatus, TrendResult } from "../types";
import { topGainers, topLosers } from "./trend";

export function timeAgo(since: number, now = Date.now()) {
    const ms = Math.max(0, now - since);
    const s = Math.floor(ms / 1000) % 60;
    const m = Math.floor(ms / (1000 * 60)) % 60;
    const h = Math.floor(ms / (1000 * 60 * 60)) % 24;
    const d = Math.floor(ms / (1000 * 60 * 60 * 24));
    const parts = [];
    if (d) parts.push(`${d}d`);
    if (h) parts.push(`${h}h`);
    if (m) parts.push(`${m}m`);
    if (s) parts.push(`${s}s`);
    return parts.join(" ") || "0s";
}

export function formatDelta(n: number) {
    const sign = n > 0 ? "+" : n < 0 ? "-" : "±";
    return `${sign}${Math.abs(n).toLocaleString("en-US")}`;
}

export function makeBar(counts: Record<string, number>, total: number) {
    const entries = Object.entries(counts).sort((a, b) => b[1] - a[1]);
    const maxLabel = Math.max(...entries.map(([k]) => k.length), 4);
    const bars = entries
        .map(([k, v]) => {
            const pct = total === 0 ? 0 : v / total;
            const barLen = Math.round(pct * 20);
            const bar = "█".repeat(barLen) + "░".repeat(20 - barLen);
            const pctStr = `${Math.round(pct * 100)}%`.padStart(4, " ");
            return `\`${k.padEnd(maxLabel)}\` ${bar} ${v.toLocaleString("en-US")} (${pctStr})`;
        })
        .join("\n");
    return bars;
}

export function standingsEmbed(state: CurrentState | undefined, now = Date.now()) {
    const e = new EmbedBuilder().setTitle("Current standings").setColor(0x00ae86).setTimestamp(now);
    if (!state) return e.setDescription("No readings yet.");
    return e
        .setDescription(makeBar(state.candidateVotes, state.currentTotal) || "No candidates.")
        .addFields(
            { name: "Total votes", value: state.currentTotal.toLocaleString("en-US"), inline: true },
            { name: "Last update", value: `${timeAgo(state.lastUpdate, now)} ago`, inline: true },
        );
}

function trendLines(rows: CandidateTrend[]) {
    return rows.map((c) => `**${c.name}**: ${formatDelta(c.voteDelta)} votes (${c.percentDelta >= 0 ? "+" : ""}${c.percentDelta.toFixed(3)}%)`).join("\n");
}

export function trendEmbed(result: TrendResult, hours: number, top = 3) {
    const e = new EmbedBuilder().setTitle(`Trend: last ${hours} hour${hours === 1 ? "" : "s"}`).setColor(0x0099ff);
    if (result.status === "insufficient-data") {
        return e.setDescription(`Not enough data for a ${hours} hour trend (${result.readings} reading${result.readings === 1 ? "" : "s"} in range).`);
    }
    const { trend } = result;
    const rate = trend.totalVotesPerMinute === undefined ? "n/a" : trend.totalVotesPerMinute.toFixed(1);
    return e
        .setDescription(`${formatDelta(trend.totalDelta)} votes over ${Math.round(trend.elapsedMinutes)} min (${rate} votes/min)`)
        .addFields(
            { name: "Top gainers", value: trendLines(topGainers(trend.candidates, top)) || "—", inline: true },
            { name: "Top losers", value: trendLines(topLosers(trend.candidates, top)) || "—", inline: true },
        )
        .setTimestamp(trend.latestAt);
}

export function statusEmbed(status: TrackerStatus, now = Date.now()) {
    const label = status.health === "running" ? "Running" : status.health === "stale" ? "Stopped (stale data)" : "No data";
    const color = status.health === "running" ? 0x28a745 : 0xdc3545;
    const e = new EmbedBuilder().setTitle("Tracker status").setDescription(label).setColor(color);
    if (status.lastUpdate !== undefined) e.addFields({ name: "Last update", value: `${timeAgo(status.lastUpdate, now)} ago` });
    return e;
}
