export interface WeatherCodeInfo {
  desc: string;
  icon: string;
}

// WMO weather interpretation codes as reported by Open-Meteo's `weathercode`.
export const WEATHER_CODES: Readonly<Record<number, WeatherCodeInfo>> = {
  0: { desc: "Clear sky", icon: "☀️" },
  1: { desc: "Mainly clear", icon: "🌤️" },
  2: { desc: "Partly cloudy", icon: "⛅" },
  3: { desc: "Overcast", icon: "☁️" },
  45: { desc: "Fog", icon: "🌫️" },
  48: { desc: "Depositing rime fog", icon: "🌫️" },
  51: { desc: "Light drizzle", icon: "🌦️" },
  53: { desc: "Moderate drizzle", icon: "🌦️" },
  55: { desc: "Dense drizzle", icon: "🌧️" },
  61: { desc: "Slight rain", icon: "🌧️" },
  63: { desc: "Moderate rain", icon: "🌧️" },
  65: { desc: "Heavy rain", icon: "⛈️" },
  71: { desc: "Slight snow", icon: "🌨️" },
  73: { desc: "Moderate snow", icon: "🌨️" },
  75: { desc: "Heavy snow", icon: "❄️" },
  80: { desc: "Rain showers", icon: "🌧️" },
  95: { desc: "Thunderstorm", icon: "⛈️" },
};

export const FALLBACK_ICON = "🌈";

export function describeWeatherCode(code: number | null | undefined): WeatherCodeInfo {
  if (code === null || code === undefined) {
    return { desc: "", icon: FALLBACK_ICON };
  }
  const entry = WEATHER_CODES[code];
  if (entry) return entry;
  return { desc: `Weather code ${code}`, icon: FALLBACK_ICON };
}
