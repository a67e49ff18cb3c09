import { Injectable, Logger } from '@nestjs/common';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { describeError, RouteParseError } from '../../errors';
import { IRoute, IWaypoint } from '../../models';
import { createRoute } from '../route.model';

type XmlNode = Record<string, unknown>;

const REPEATED_ELEMENTS = new Set(['trk', 'trkseg', 'trkpt', 'rte', 'rtept']);

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNodes(value: unknown): XmlNode[] {
  if (Array.isArray(value)) {
    return value.filter(isNode);
  }
  return isNode(value) ? [value] : [];
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  // <name><![CDATA[..]]></name> y similares
  if (isNode(value) && typeof value['#text'] === 'string') {
    return value['#text'].trim() || undefined;
  }
  return undefined;
}

/**
 * Parser de archivos GPX (1.0 / 1.1)
 *
 * Extrae los puntos de <trk>/<trkseg>/<trkpt>. Si el archivo no tiene
 * tracks usa los puntos de <rte>/<rtept>.
 */
@Injectable()
export class RouteParserService {
  private readonly logger = new Logger(RouteParserService.name);

  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    removeNSPrefix: true,
    trimValues: true,
    isArray: (tagName: string) => REPEATED_ELEMENTS.has(tagName),
  });

  /**
   * Parsea el contenido crudo de un archivo GPX
   *
   * @param raw Bytes o texto del archivo
   * @param source Nombre del archivo, usado en los mensajes de error
   * @throws RouteParseError si el XML no es GPX válido o falta lat/lon en algún punto
   * @throws EmptyRouteError si no se extrae ningún punto
   */
  parse(raw: Buffer | string, source = 'route.gpx'): IRoute {
    const xml = (typeof raw === 'string' ? raw : raw.toString('utf-8')).replace(
      /^\uFEFF/,
      '',
    );

    if (xml.trim().length === 0) {
      throw new RouteParseError(source, 'file is empty');
    }

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new RouteParseError(
        source,
        `Invalid GPX format: ${validation.err.msg} (line ${validation.err.line})`,
      );
    }

    let document: unknown;
    try {
      document = this.parser.parse(xml);
    } catch (error) {
      throw new RouteParseError(source, describeError(error).message);
    }

    if (!isNode(document) || document.gpx === undefined) {
      throw new RouteParseError(source, 'missing <gpx> root element');
    }

    // <gpx></gpx> sin contenido llega como string vacío
    const gpx = isNode(document.gpx) ? document.gpx : {};

    const tracks = asNodes(gpx.trk);
    let nodes = tracks
      .flatMap((trk) => asNodes(trk.trkseg))
      .flatMap((segment) => asNodes(segment.trkpt));

    if (nodes.length === 0) {
      nodes = asNodes(gpx.rte).flatMap((rte) => asNodes(rte.rtept));
    }

    const waypoints = nodes.map((node, index) =>
      this.toWaypoint(node, index, source),
    );

    const name =
      (isNode(gpx.metadata) ? asText(gpx.metadata.name) : undefined) ??
      asText(gpx.name) ??
      (tracks.length > 0 ? asText(tracks[0].name) : undefined);

    const route = createRoute(waypoints, { name, source });

    this.logger.log(
      `Loaded ${route.pointCount} points from ${source}. ` +
        `Dist: ${route.totalDistance.toFixed(2)}m, Dur: ${route.totalDuration.toFixed(2)}s`,
    );

    return route;
  }

  private toWaypoint(node: XmlNode, index: number, source: string): IWaypoint {
    const lat = this.readCoordinate(node, 'lat', index, source);
    const lon = this.readCoordinate(node, 'lon', index, source);

    if (lat < -90 || lat > 90) {
      throw new RouteParseError(source, `point ${index} has latitude out of range: ${lat}`);
    }
    if (lon < -180 || lon > 180) {
      throw new RouteParseError(source, `point ${index} has longitude out of range: ${lon}`);
    }

    let elevation: number | undefined;
    const rawElevation = asText(node.ele);
    if (rawElevation !== undefined) {
      elevation = Number(rawElevation);
      if (!Number.isFinite(elevation)) {
        throw new RouteParseError(source, `point ${index} has invalid elevation '${rawElevation}'`);
      }
    }

    let timestamp: number | undefined;
    const rawTime = asText(node.time);
    if (rawTime !== undefined) {
      timestamp = Date.parse(rawTime);
      if (Number.isNaN(timestamp)) {
        throw new RouteParseError(source, `point ${index} has invalid time '${rawTime}'`);
      }
    }

    return { lat, lon, elevation, timestamp };
  }

  private readCoordinate(
    node: XmlNode,
    field: 'lat' | 'lon',
    index: number,
    source: string,
  ): number {
    const raw = node[`@_${field}`];
    if (typeof raw !== 'string' || raw.trim().length === 0) {
      throw new RouteParseError(source, `point ${index} is missing '${field}'`);
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new RouteParseError(source, `point ${index} has invalid ${field} '${raw}'`);
    }
    return value;
  }
}
