// Usage: tsx src/scripts/forecast.ts --file data/AnimalOutcome.csv --counselors 3 [--weekday Monday]
import { runForecast } from "./runForecast.js";

runForecast(process.argv.slice(2), {
    out: line => console.log(line),
    err: line => console.error(line),
    stdin: process.stdin,
})
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[Forecast] Unexpected failure", error);
        process.exitCode = 1;
    });
