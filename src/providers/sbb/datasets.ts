/**
 * SBB Dataset Tools
 *
 * One tool per data.sbb.ch dataset. Record schemas list the fields each
 * dataset is known to carry; every field is optional because `select`
 * and `group_by` reshape the records, and unknown fields pass through.
 */
import { z } from 'zod';
import { type ToolDefinition } from '../../core/builder/defineTool.js';
import { param } from '../../core/schema/params.js';
import {
    type ProviderContext,
    defineRecordsTool,
    facetQuery,
    GeoPoint,
} from './records.js';

const text = z.string().nullish();
const num = z.number().nullish();
const flag = z.boolean().nullish();

// ── Rail Traffic Information ─────────────────────────────

const TrafficInfo = z.object({
    title: text,
    link: text,
    description: text,
    published: text,
    author: text,
    validitybegin: text,
    validityend: text,
    description_html: text,
}).passthrough();

export const railTrafficInfo = defineRecordsTool({
    name: 'rail-traffic-info',
    description: 'Fetch current rail traffic information (disruptions, construction work, notices) from SBB',
    dataset: 'rail-traffic-information',
    hints: {
        subject: 'traffic info entries',
        select: "'title,description' for basic info, 'title,validitybegin,validityend' for timing",
        where: "'validitybegin >= NOW()'",
        groupBy: "'author'",
        orderBy: "'published DESC' for newest first",
    },
    input: {
        ...facetQuery({ refine: "'author:SBB'", exclude: "'author:SBB'" }),
        timezone: param.string().default('UTC')
            .describe("Timezone for validity and publication times. Example: 'Europe/Zurich'"),
    },
    record: TrafficInfo,
});

// ── Railway Lines ────────────────────────────────────────

const RailwayLine = z.object({
    linie: num,
    linienname: text,
    bpk_anfang: text,
    bpk_ende: text,
    km_anfang: num,
    km_ende: num,
    stationierung_anfang: num,
    stationierung_ende: num,
    tst: z.object({
        type: z.string(),
        geometry: z.object({
            type: z.string(),
            coordinates: z.array(z.array(z.number())),
        }).passthrough(),
    }).passthrough().nullish(),
    geo_point_2d: GeoPoint.nullish(),
}).passthrough();

export const railwayLines = defineRecordsTool({
    name: 'railway-lines',
    description: 'Fetch railway line information (line numbers, end stations, kilometres, geometry)',
    dataset: 'linie',
    hints: {
        subject: 'railway lines',
        select: "'linie,linienname' for basic info, 'bpk_anfang,bpk_ende' for end stations",
        where: "'linie = 100'",
        groupBy: "'bpk_anfang'",
        orderBy: "'linie ASC', 'km_ende DESC' for longest routes first",
    },
    record: RailwayLine,
});

// ── Rolling Stock ────────────────────────────────────────

const RollingStock = z.object({
    fahrzeug_art_struktur: text,
    fahrzeug_typ: text,
    objekt: text,
    baudatum_fahrzeug: text,
    eigengewicht_tara: num,
    lange_uber_puffer_lup: num,
    vmax_betrieblich_zugelassen: num,
}).passthrough();

export const rollingStock = defineRecordsTool({
    name: 'rolling-stock',
    description: 'Fetch rolling stock (vehicle) information: type, build date, weight, length, top speed',
    dataset: 'rollmaterial',
    hints: {
        subject: 'vehicles',
        select: "'fahrzeug_typ,objekt'",
        where: "'vmax_betrieblich_zugelassen > 100'",
        groupBy: "'fahrzeug_typ'",
        orderBy: "'baudatum_fahrzeug ASC' for oldest first",
    },
    record: RollingStock,
    render: 'toon',
});

// ── Station Users ────────────────────────────────────────

const StationUsers = z.object({
    bahnhof_gare_stazione: text,
    jahr: num,
    anzahl_bahnhofbenutzer: num,
}).passthrough();

export const stationUsers = defineRecordsTool({
    name: 'station-users',
    description: 'Fetch the average number of daily station users per SBB station and year',
    dataset: 'anzahl-sbb-bahnhofbenutzer',
    hints: {
        subject: 'station counts',
        select: "'bahnhof_gare_stazione,anzahl_bahnhofbenutzer'",
        where: "'jahr = 2023'",
        groupBy: "'jahr'",
        orderBy: "'anzahl_bahnhofbenutzer DESC' for busiest stations first",
    },
    input: facetQuery({ refine: "'jahr:2023'", exclude: "'jahr:2018'" }),
    record: StationUsers,
    render: 'toon',
});

// ── Target/Actual Comparison ─────────────────────────────

const ActualData = z.object({
    betriebstag: text,
    fahrt_bezeichner: text,
    betreiber_id: text,
    betreiber_abk: text,
    betreiber_name: text,
    produkt_id: text,
    linien_id: z.union([z.number(), z.string()]).nullish(),
    linien_text: text,
    umlauf_id: text,
    verkehrsmittel_text: text,
    zusatzfahrt_tf: flag,
    faellt_aus_tf: flag,
    bpuic: num,
    haltestellen_name: text,
    ankunftszeit: text,
    an_prognose: text,
    an_prognose_status: text,
    abfahrtszeit: text,
    ab_prognose: text,
    ab_prognose_status: text,
    durchfahrt_tf: flag,
    ankunftsverspatung: flag,
    abfahrtsverspatung: flag,
    geopos: GeoPoint.nullish(),
    lod: text,
}).passthrough();

export const targetActualCompared = defineRecordsTool({
    name: 'target-actual-compared',
    description: 'Compare scheduled and actual arrival/departure times of the previous operating day',
    dataset: 'ist-daten-sbb',
    hints: {
        subject: 'stop events',
        select: "'linien_text,haltestellen_name,ankunftszeit,an_prognose'",
        where: "'faellt_aus_tf = true'",
        groupBy: "'betreiber_abk'",
        orderBy: "'ankunftszeit ASC'",
    },
    input: facetQuery({ refine: "'produkt_id:Zug'", exclude: "'produkt_id:Bus'" }),
    record: ActualData,
});

// ── Station Furniture ────────────────────────────────────

const StationFurniture = z.object({
    we: text,
    didok: num,
    bezeichnung: text,
    flame2: num,
    einheit: text,
    bezeichnung_offiziell: text,
    lod: text,
    geopos: GeoPoint.nullish(),
    tu_nummer: num,
    bpuic: num,
}).passthrough();

export const stationFurniture = defineRecordsTool({
    name: 'station-furniture',
    description: 'Fetch furniture inventory of stations (benches, waste bins, shelters) with counts',
    dataset: 'mobiliar-im-bahnhof',
    hints: {
        subject: 'furniture entries',
        select: "'bezeichnung,bezeichnung_offiziell'",
        where: "'bpuic = 8502113'",
        groupBy: "'bezeichnung'",
        orderBy: "'flame2 DESC' for the highest counts first",
    },
    input: facetQuery({
        refine: "'lod:http://lod.opentransportdata.swiss/didok/8502113'",
        exclude: "'einheit:Stk'",
    }),
    record: StationFurniture,
});

// ── Station Services ─────────────────────────────────────

const StationService = z.object({
    dst_nr: num,
    stationsbezeichnung: text,
    datum: text,
    feiertag: text,
    wochentag: text,
    national: num,
    servicetyp: num,
    servicename: text,
    closed: text,
    von1: text,
    bis1: text,
    von2: text,
    bis2: text,
    von3: text,
    bis3: text,
    unternehmung: text,
    bpuic: num,
    bezeichnung_offiziell: text,
    abkuerzung: text,
    lod: text,
    geopos: GeoPoint.nullish(),
    tu_nummer: num,
    meteo: text,
    plz: text,
}).passthrough();

export const stationServices = defineRecordsTool({
    name: 'station-services',
    description: 'Fetch opening hours of station services (ticket counters, lost property, luggage)',
    dataset: 'haltestelle-offnungszeiten',
    hints: {
        subject: 'service entries',
        select: "'stationsbezeichnung,servicename,von1,bis1'",
        where: "'stationsbezeichnung = \"Bern\"'",
        groupBy: "'servicename'",
        orderBy: "'datum ASC'",
    },
    input: facetQuery({ refine: "'servicetyp:1'", exclude: "'closed:true'" }),
    record: StationService,
});

// ── Station Stores ───────────────────────────────────────

const StationStore = z.object({
    station_uic: num,
    category: text,
    subcategory: text,
    name_de: text,
    name_fr: text,
    name_it: text,
    name_en: text,
    icon_svg: text,
    contacts: z.unknown(),
    openinghours: z.unknown(),
    geo: GeoPoint.nullish(),
    location_details_de: text,
    location_details_fr: text,
    location_details_it: text,
    location_details_en: text,
    floor: z.unknown(),
    url_identifier: text,
    url_alias: text,
    meteo: text,
    bezeichnung_offiziell: text,
    display_name: text,
}).passthrough();

export const stationStores = defineRecordsTool({
    name: 'station-stores',
    description: 'Fetch shops and their opening hours at SBB stations',
    dataset: 'offnungszeiten-shops',
    hints: {
        subject: 'stores',
        select: "'display_name,category,openinghours'",
        where: "'bezeichnung_offiziell = \"Zürich HB\"'",
        groupBy: "'category'",
        orderBy: "'display_name ASC'",
    },
    input: facetQuery({ refine: "'category:Food'", exclude: "'category:Services'" }),
    record: StationStore,
});

/** Every SBB tool, in advertisement order. */
export const sbbTools: readonly ToolDefinition<ProviderContext>[] = [
    railTrafficInfo,
    railwayLines,
    rollingStock,
    stationUsers,
    targetActualCompared,
    stationFurniture,
    stationServices,
    stationStores,
];
