export interface ExampleCity {
  name: string;
  lat: string;
  lon: string;
}

export const EXAMPLE_CITIES: readonly ExampleCity[] = [
  { name: 'New York City', lat: '40.7128', lon: '-74.0060' },
  { name: 'Los Angeles', lat: '34.0522', lon: '-118.2437' },
  { name: 'Chicago', lat: '41.8781', lon: '-87.6298' },
  { name: 'Miami', lat: '25.7617', lon: '-80.1918' },
  { name: 'Seattle', lat: '47.6062', lon: '-122.3321' },
];

export function weatherLink(city: ExampleCity): string {
  return `/weather?lat=${city.lat}&amp;lon=${city.lon}`;
}

export function renderUsagePage(): string {
  const examples = EXAMPLE_CITIES.map(
    (city) => `    <p>Example: <a href="${weatherLink(city)}">${city.name}</a></p>`
  ).join('\n');

  return `<!DOCTYPE html>
<html>
<head><title>Weather Service</title></head>
<body>
    <h1>Weather Service</h1>
    <p>Use the /weather endpoint with latitude and longitude parameters:</p>
    <p><code>/weather?lat=40.7128&amp;lon=-74.0060</code></p>

    <h2>Example US Cities:</h2>
${examples}

    <h2>Important Note:</h2>
    <p><strong>This service only works for US locations.</strong> The National Weather Service API covers the United States and its territories only.</p>
    <p>For international locations, coordinates outside the US will return an error.</p>
</body>
</html>
`;
}
