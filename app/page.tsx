import { Button, Card, CardBody, CardHeader, Input } from "@heroui/react";
import { loadConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export default function HomePage() {
  const { lookbackDaysLimit } = loadConfig();

  return (
    <main className="flex min-h-screen items-center justify-center p-6">
      <Card shadow="sm" className="w-full max-w-md">
        <CardHeader>
          <h1 className="text-xl font-semibold">Flood Monitoring Data</h1>
        </CardHeader>
        <CardBody>
          {/* Plain GET form: /monitor answers with a full HTML results page */}
          <form action="/monitor" method="get" className="flex flex-col gap-4">
            <Input name="station_id" label="Station ID" isRequired />
            <Input
              name="days_back"
              type="number"
              label="Days back"
              defaultValue="1"
              min={1}
              max={lookbackDaysLimit}
              description={`Between 1 and ${lookbackDaysLimit}`}
            />
            <Button type="submit" color="primary">
              Get Data
            </Button>
          </form>
        </CardBody>
      </Card>
    </main>
  );
}
